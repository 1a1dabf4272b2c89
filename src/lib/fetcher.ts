import fetch, { RequestInit, Response } from 'node-fetch';
import { HttpError, RequestError, errorMessage } from './errors.js';
import Logger from './logger.js';

export const RETRYABLE_STATUSES: readonly number[] = [429, 500, 502, 503, 504];

export interface RetryOptions {
  timeoutMs?: number;
  retries?: number;
  backoffBaseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export type HttpGet = (
  url: string,
  init?: RequestInit,
  options?: RetryOptions
) => Promise<Response>;

export const delay = (ms: number) =>
  new Promise<void>(resolve => setTimeout(resolve, ms));

export async function httpGet(
  url: string,
  init: RequestInit = {},
  { timeoutMs = 5000, retries = 2, backoffBaseMs = 500, sleep = delay }: RetryOptions = {}
): Promise<Response> {
  let lastErr: unknown;
  for (let i = 0; i <= retries; i++) {
    let res: Response | undefined;
    try {
      res = await fetch(url, { ...init, timeout: timeoutMs });
    } catch (e) {
      lastErr = e;
    }
    if (res?.ok) return res;
    if (res) {
      const err = new HttpError(url, res.status, res.statusText);
      if (!RETRYABLE_STATUSES.includes(res.status)) throw err;
      lastErr = err;
    }

    Logger.warn(`Attempt ${i + 1}: request failed.`, { url, error: errorMessage(lastErr) });
    if (i < retries) {
      const waitMs = backoffBaseMs * Math.pow(2, i);
      Logger.info(`Retrying in ${waitMs}ms (attempt ${i + 2} of ${retries + 1}).`);
      await sleep(waitMs);
    }
  }

  if (lastErr instanceof RequestError) throw lastErr;
  throw new RequestError(`All ${retries + 1} request attempts failed for ${url}: ${errorMessage(lastErr)}`, {
    cause: lastErr,
  });
}
