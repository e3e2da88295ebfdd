import axios from 'axios';
import { FailureKind, ProviderFailure } from '../types/EnvironmentalData';

/**
 * Error carrying one of the failure kinds of the aggregation layer
 */
export class ProviderError extends Error {
  readonly kind: FailureKind;
  readonly retryAfterMs: number | null;

  constructor(kind: FailureKind, message: string, retryAfterMs: number | null = null) {
    super(message);
    this.name = 'ProviderError';
    this.kind = kind;
    this.retryAfterMs = retryAfterMs;
  }

  toFailure(): ProviderFailure {
    return { kind: this.kind, message: this.message, retryAfterMs: this.retryAfterMs };
  }
}

/**
 * Thrown by the aggregator when the query itself cannot be served.
 * This is the only error that escapes `resolve`.
 */
export class MalformedQueryError extends ProviderError {
  constructor(message: string) {
    super('MalformedQuery', message);
    this.name = 'MalformedQueryError';
  }
}

export class CacheUnavailableError extends ProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CacheUnavailable', message);
    this.name = 'CacheUnavailableError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Retry-After is either delta-seconds or an HTTP-date
 */
function parseRetryAfter(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.round(value * 1000) : null;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : null;
  }

  const at = Date.parse(value);
  return Number.isNaN(at) ? null : Math.max(0, at - Date.now());
}

/**
 * Map anything thrown during a provider call onto the failure taxonomy
 */
export function classifyError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (axios.isCancel(error)) {
    return new ProviderError('ProviderUnavailable', `${provider} request was aborted (timed out)`);
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status === undefined) {
      const reason = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' ? 'timed out' : error.message;
      return new ProviderError('ProviderUnavailable', `${provider} unreachable: ${reason}`);
    }
    if (status === 429) {
      return new ProviderError(
        'ProviderRateLimited',
        `${provider} rate limit reached`,
        parseRetryAfter(error.response?.headers['retry-after']),
      );
    }
    if (status >= 500) {
      return new ProviderError('ProviderUnavailable', `${provider} responded with ${status}`);
    }
    return new ProviderError('ProviderRejected', `${provider} rejected the request with ${status}`);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError('ProviderUnavailable', `${provider} failed: ${message}`);
}
