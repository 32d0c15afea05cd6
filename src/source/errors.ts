/**
 * Failure taxonomy for calls to the remote catalog.
 *
 * Retryable: TransientSourceError (network, 429, 5xx, empty body) and
 * PayloadParseError (unparsable response). Not retryable:
 * PermanentSourceError (other 4xx, missing documents).
 */

export interface SourceErrorDetails {
  url?: string;
  status?: number;
  cause?: unknown;
}

export class TransientSourceError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, details: SourceErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = "TransientSourceError";
    this.url = details.url ?? "";
    this.status = details.status ?? null;
  }
}

export class PayloadParseError extends Error {
  readonly url: string;

  constructor(message: string, details: SourceErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = "PayloadParseError";
    this.url = details.url ?? "";
  }
}

export class PermanentSourceError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, details: SourceErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = "PermanentSourceError";
    this.url = details.url ?? "";
    this.status = details.status ?? null;
  }
}

export function isRetryableSourceError(error: unknown): boolean {
  return error instanceof TransientSourceError || error instanceof PayloadParseError;
}

/**
 * HTTP statuses worth retrying: rate limiting and upstream trouble.
 */
export function isTransientStatus(status: number): boolean {
  return status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}
