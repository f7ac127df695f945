/**
 * Errors raised by the Postmark client.
 *
 * Every failure reaches the caller as one of these; nothing is retried or
 * swallowed locally.
 */

/**
 * Provider error codes that mean the addressed resource does not exist
 * (407: bounce not found, 1101: template not found)
 */
export const NOT_FOUND_ERROR_CODES: ReadonlySet<number> = new Set([407, 1101]);

export class PostmarkClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PostmarkClientError';
  }
}

/**
 * Client constructed without a usable configuration
 */
export class ConfigurationError extends PostmarkClientError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Argument rejected before any request was sent
 */
export class InvalidArgumentError extends PostmarkClientError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Request payload could not be serialized to JSON
 */
export class EncodingError extends PostmarkClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodingError';
  }
}

/**
 * No response was received (DNS, refused connection, timeout)
 */
export class TransportError extends PostmarkClientError {
  public readonly code?: string;
  public readonly timedOut: boolean;

  constructor(message: string, options: { code?: string; timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.code = options.code;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Any HTTP status other than 200. Carries the raw body for diagnostics and,
 * when the body was a provider error envelope, its code and message.
 */
export class UnexpectedStatusError extends PostmarkClientError {
  public readonly status: number;
  public readonly body: string;
  public readonly errorCode?: number;
  public readonly providerMessage?: string;

  constructor(status: number, body: string, envelope?: { errorCode: number; message: string }) {
    super(`unexpected status code: ${status}, response: ${body}`);
    this.name = 'UnexpectedStatusError';
    this.status = status;
    this.body = body;
    this.errorCode = envelope?.errorCode;
    this.providerMessage = envelope?.message;
  }

  get isNotFound(): boolean {
    return this.status === 404 || (this.errorCode !== undefined && NOT_FOUND_ERROR_CODES.has(this.errorCode));
  }
}

/**
 * Response body was not JSON, or not the expected shape
 */
export class DecodingError extends PostmarkClientError {
  public readonly body: string;

  constructor(message: string, body: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodingError';
    this.body = body;
  }
}

/**
 * HTTP 200 whose error envelope carried a non-zero ErrorCode
 */
export class RemoteRejectionError extends PostmarkClientError {
  public readonly errorCode: number;
  public readonly providerMessage: string;
  public readonly operation: string;

  constructor(operation: string, errorCode: number, providerMessage: string) {
    super(`failed to ${operation}: ${providerMessage}`);
    this.name = 'RemoteRejectionError';
    this.operation = operation;
    this.errorCode = errorCode;
    this.providerMessage = providerMessage;
  }

  get isNotFound(): boolean {
    return NOT_FOUND_ERROR_CODES.has(this.errorCode);
  }
}
