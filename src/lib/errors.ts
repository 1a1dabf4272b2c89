export interface ErrorOptions {
  status?: number;
  cause?: unknown;
}

export class AppError extends Error {
  readonly status?: number;

  constructor(message: string, { status, cause }: ErrorOptions = {}) {
    super(message, { cause });
    this.name = new.target.name;
    this.status = status;
  }
}

/** Missing or invalid configuration. Raised before any request is made. */
export class ConfigError extends AppError {}

/** A request that could not be completed after all attempts. */
export class RequestError extends AppError {}

export class HttpError extends RequestError {
  constructor(readonly url: string, status: number, statusText: string) {
    super(`HTTP ${status} ${statusText}`.trim(), { status });
  }
}

export class MalformedResponseError extends RequestError {}

/** Output could not be written; partial output may already exist. */
export class PersistenceError extends AppError {}

export class ScrapeAbortedError extends AppError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
