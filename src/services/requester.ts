import { z } from 'zod';
import type { DateWindow } from '../lib/dates.js';
import { MalformedResponseError, RequestError, errorMessage } from '../lib/errors.js';
import { type HttpGet, httpGet } from '../lib/fetcher.js';
import Logger from '../lib/logger.js';
import type { ScraperConfig, SearchPage } from '../types/news.js';

export const searchResponseSchema = z.object({
  total: z.coerce.number().int().nonnegative(),
  items: z.array(z.record(z.string(), z.unknown())),
});

/** Anything that can return one page of stories for a window and offset. */
export interface PageSource {
  fetchPage(window: DateWindow, offset: number): Promise<SearchPage>;
}

type RequesterConfig = Pick<
  ScraperConfig,
  'baseUrl' | 'limit' | 'authToken' | 'maxAttempts' | 'backoffBaseMs' | 'requestTimeoutMs'
>;

export class Requester implements PageSource {
  constructor(
    private readonly config: RequesterConfig,
    private readonly get: HttpGet = httpGet
  ) {}

  /**
   * `published-after` and `published-before` are unix milliseconds.
   */
  buildUrl({ start, end }: DateWindow, offset: number): string {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set('offset', String(offset));
    url.searchParams.set('limit', String(this.config.limit));
    url.searchParams.set('sort', 'latest-published');
    url.searchParams.set('published-after', String(start.getTime()));
    url.searchParams.set('published-before', String(end.getTime()));
    return url.toString();
  }

  async fetchPage(window: DateWindow, offset: number): Promise<SearchPage> {
    const url = this.buildUrl(window, offset);
    Logger.info(`Request URL: ${url}`);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.authToken) headers.Authorization = `Bearer ${this.config.authToken}`;

    const res = await this.get(url, { headers }, {
      timeoutMs: this.config.requestTimeoutMs,
      retries: this.config.maxAttempts - 1,
      backoffBaseMs: this.config.backoffBaseMs,
    });

    let body: string;
    try {
      body = await res.text();
    } catch (error) {
      throw new RequestError(`Failed to read response body from ${url}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new MalformedResponseError(`Response from ${url} is not valid JSON`, { cause: error });
    }

    const parsed = searchResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MalformedResponseError(
        `Unexpected response shape from ${url}: ${issue.path.join('.')} ${issue.message}`.trim()
      );
    }
    return parsed.data;
  }
}
