import axios from 'axios';
import {
  RateLimitedError,
  SentimentServiceError,
  UpstreamUnavailableError,
  errorMessage,
} from '@/utils/errors';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

type HeaderBag = object;

const readHeader = (headers: HeaderBag | undefined, name: string): string | undefined => {
  if (!headers) return undefined;
  const value: unknown = Reflect.get(headers, name);
  return value === undefined || value === null ? undefined : String(value);
};

/** Seconds to wait, from `retry-after` (seconds) or `x-rate-limit-reset` (epoch seconds). */
export function parseRetryAfter(headers: HeaderBag | undefined, nowMs: number = Date.now()): number | undefined {
  const retryAfter = Number(readHeader(headers, 'retry-after'));
  if (Number.isFinite(retryAfter) && retryAfter >= 0) {
    return Math.ceil(retryAfter);
  }

  const reset = Number(readHeader(headers, 'x-rate-limit-reset'));
  if (Number.isFinite(reset) && reset > 0) {
    return Math.max(0, Math.ceil(reset - nowMs / 1000));
  }

  return undefined;
}

/**
 * Maps a failed upstream call onto the service's failure kinds.
 * Errors that already carry a kind pass through.
 */
export function translateUpstreamError(source: string, error: unknown): SentimentServiceError {
  if (error instanceof SentimentServiceError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status === 429) {
      return new RateLimitedError(source, parseRetryAfter(error.response?.headers));
    }
    if (status === 401 || status === 403) {
      return new UpstreamUnavailableError(source, `access denied (HTTP ${status}), check API credentials`);
    }
    if (status !== undefined) {
      return new UpstreamUnavailableError(source, `HTTP ${status}`);
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new UpstreamUnavailableError(source, 'request timed out', 504);
    }
    return new UpstreamUnavailableError(source, error.message);
  }

  return new UpstreamUnavailableError(source, errorMessage(error));
}
