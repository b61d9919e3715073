import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenerativeAIError, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import type { ErrorKind } from '../types/index.js';
import { AnalysisError } from '../types/index.js';

const RETRYABLE: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['Timeout', 'ServiceUnavailable', 'RateLimited']);

/** Thrown by backends that talk HTTP directly rather than through an SDK. */
export class UpstreamStatusError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'UpstreamStatusError';
    this.status = status;
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function kindForStatus(status: number): ErrorKind {
  switch (status) {
    case 401:
    case 403:
      return 'Unauthorized';
    case 429:
      return 'RateLimited';
    case 408:
    case 504:
      return 'Timeout';
    case 500:
    case 502:
    case 503:
    case 529:
      return 'ServiceUnavailable';
    default:
      return 'UnknownUpstreamError';
  }
}

// Both SDKs expose the HTTP status on their error objects
export function classifyUpstreamError(error: unknown): ErrorKind {
  if (error instanceof AnalysisError) return error.kind;
  if (error instanceof Anthropic.APIConnectionTimeoutError) return 'Timeout';

  const status = statusOf(error);
  if (status !== undefined) return kindForStatus(status);

  if (error instanceof Anthropic.APIConnectionError) return 'ServiceUnavailable';
  // The Gemini SDK rewraps network failures without a status
  if (
    error instanceof GoogleGenerativeAIError &&
    !(error instanceof GoogleGenerativeAIFetchError) &&
    error.message.startsWith('Error fetching from')
  ) {
    return 'ServiceUnavailable';
  }
  // undici reports network failures as a bare TypeError
  if (error instanceof TypeError && error.message === 'fetch failed') return 'ServiceUnavailable';

  return 'UnknownUpstreamError';
}

export function isRetryable(kind: ErrorKind): boolean {
  return RETRYABLE.has(kind);
}
