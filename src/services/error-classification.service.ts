/**
 * Error Classification Service
 *
 * Tells a caller whether a failed Postmark call is worth repeating.
 * The client itself never retries; this only labels the error.
 *
 * Retryable:
 * - Transport failures (ECONNREFUSED, ENOTFOUND, ETIMEDOUT, ...)
 * - 408 Request Timeout
 * - 429 Too Many Requests
 * - 5xx Server errors
 *
 * Terminal:
 * - Other 4xx (401 bad token, 422 rejected payload, ...)
 * - Error envelopes with a non-zero ErrorCode
 * - Encoding, decoding, configuration and argument failures
 */

import {
  ConfigurationError,
  InvalidArgumentError,
  EncodingError,
  TransportError,
  UnexpectedStatusError,
  DecodingError,
  RemoteRejectionError,
} from '../errors/postmark.errors.js';

export type ErrorCategory =
  | 'network'
  | 'timeout'
  | 'rate_limit'
  | 'server_error'
  | 'client_error'
  | 'rejected'
  | 'encoding'
  | 'decoding'
  | 'configuration'
  | 'invalid_argument'
  | 'unknown';

export interface ErrorClassification {
  isRetryable: boolean;
  category: ErrorCategory;
  reason: string;
}

const CLIENT_ERROR_REASONS: Record<number, string> = {
  400: '400 Bad Request - invalid request format',
  401: '401 Unauthorized - missing or incorrect server token',
  404: '404 Not Found - resource does not exist',
  413: '413 Payload Too Large - request exceeds size limits',
  415: '415 Unsupported Media Type - body must be JSON',
  422: '422 Unprocessable Entity - rejected by Postmark',
};

const SERVER_ERROR_REASONS: Record<number, string> = {
  500: '500 Internal Server Error',
  502: '502 Bad Gateway',
  503: '503 Service Unavailable',
  504: '504 Gateway Timeout',
};

/**
 * Classifies an HTTP status received from Postmark
 */
export function classifyStatus(status: number): ErrorClassification {
  if (status === 408) {
    return { isRetryable: true, category: 'timeout', reason: '408 Request Timeout' };
  }

  if (status === 429) {
    return {
      isRetryable: true,
      category: 'rate_limit',
      reason: '429 Too Many Requests - rate limit exceeded',
    };
  }

  if (status >= 400 && status < 500) {
    return {
      isRetryable: false,
      category: 'client_error',
      reason: CLIENT_ERROR_REASONS[status] ?? `${status} Client Error - permanent failure`,
    };
  }

  if (status >= 500 && status < 600) {
    return {
      isRetryable: true,
      category: 'server_error',
      reason: SERVER_ERROR_REASONS[status] ?? `${status} Server Error - temporary failure`,
    };
  }

  // 1xx, 3xx and 2xx other than 200 are not part of the API contract
  return {
    isRetryable: false,
    category: 'unknown',
    reason: `${status} Unexpected status`,
  };
}

/**
 * Classifies any error thrown by the client
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof TransportError) {
    if (error.timedOut) {
      return { isRetryable: true, category: 'timeout', reason: 'Request timeout' };
    }
    return {
      isRetryable: true,
      category: 'network',
      reason: `Network error - ${error.code ?? 'connection failed'}`,
    };
  }

  if (error instanceof UnexpectedStatusError) {
    return classifyStatus(error.status);
  }

  if (error instanceof RemoteRejectionError) {
    return {
      isRetryable: false,
      category: 'rejected',
      reason: `ErrorCode ${error.errorCode} - ${error.providerMessage}`,
    };
  }

  if (error instanceof EncodingError) {
    return { isRetryable: false, category: 'encoding', reason: 'Request body could not be encoded' };
  }

  if (error instanceof DecodingError) {
    return { isRetryable: false, category: 'decoding', reason: 'Response body could not be decoded' };
  }

  if (error instanceof ConfigurationError) {
    return { isRetryable: false, category: 'configuration', reason: error.message };
  }

  if (error instanceof InvalidArgumentError) {
    return { isRetryable: false, category: 'invalid_argument', reason: error.message };
  }

  return { isRetryable: false, category: 'unknown', reason: 'Not a Postmark client error' };
}

export function isRetryableError(error: unknown): boolean {
  return classifyError(error).isRetryable;
}
