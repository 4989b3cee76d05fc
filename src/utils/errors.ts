export type FailureKind = 'not_found' | 'rate_limited' | 'upstream_unavailable' | 'invalid_input';

export interface FailureBody {
  error: FailureKind;
  message: string;
  retryAfter?: number;
}

/**
 * Base class for failures the service reports to its callers.
 *
 * `kind` separates "try again later" (rate_limited, upstream_unavailable)
 * from "this request cannot succeed" (not_found, invalid_input).
 */
export class SentimentServiceError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): FailureBody {
    return {
      error: this.kind,
      message: this.message,
    };
  }
}

export class NotFoundError extends SentimentServiceError {
  constructor(subject: string, detail = 'no upstream data') {
    super(`No data found for ${subject}: ${detail}`, 'not_found', 404);
  }
}

const retryHint = (retryAfterSeconds?: number): string =>
  retryAfterSeconds !== undefined
    ? ` Retry after ${retryAfterSeconds} seconds.`
    : ' Please try again later.';

export class RateLimitedError extends SentimentServiceError {
  constructor(
    source: string,
    public readonly retryAfterSeconds?: number
  ) {
    super(`${source} rate limit exceeded.${retryHint(retryAfterSeconds)}`, 'rate_limited', 429);
  }

  toJSON(): FailureBody {
    return {
      ...super.toJSON(),
      ...(this.retryAfterSeconds !== undefined ? { retryAfter: this.retryAfterSeconds } : {}),
    };
  }
}

export class UpstreamUnavailableError extends SentimentServiceError {
  constructor(source: string, reason: string, statusCode = 502) {
    super(`${source} unavailable: ${reason}`, 'upstream_unavailable', statusCode);
  }
}

export class InvalidInputError extends SentimentServiceError {
  constructor(message: string) {
    super(message, 'invalid_input', 400);
  }
}

export const isRateLimited = (error: unknown): error is RateLimitedError =>
  error instanceof RateLimitedError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
