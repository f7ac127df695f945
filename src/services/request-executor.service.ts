import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { z } from 'zod';
import type { HttpMethod, QueryValue } from '../types/client.types.js';
import {
  EncodingError,
  TransportError,
  UnexpectedStatusError,
  DecodingError,
  RemoteRejectionError,
} from '../errors/postmark.errors.js';
import { errorEnvelopeSchema, providerErrorSchema, type ErrorEnvelope } from '../schemas/postmark.schemas.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';

export interface RequestExecutorConfig {
  serverToken: string;
  baseUrl: string;
  timeout: number;
}

export interface RequestOptions {
  method: HttpMethod;
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  /**
   * Name of the operation, used in rejection messages. When present the
   * response's ErrorCode/Message envelope is checked before decoding.
   */
  operation?: string;
}

/**
 * Request Executor
 *
 * Runs the marshal -> send -> status-check -> unmarshal sequence shared by
 * every Postmark operation. Holds the server token and base URL and never
 * mutates them; the axios instance is the only shared resource.
 *
 * Anything other than HTTP 200 is a failure. Bodies are always read as raw
 * text so the exact payload can be attached to errors.
 */
export class RequestExecutor {
  private config: RequestExecutorConfig;
  private httpClient: AxiosInstance;
  private logger: StructuredLogger;

  constructor(
    config: RequestExecutorConfig,
    deps: { httpClient?: AxiosInstance; logger?: StructuredLogger } = {}
  ) {
    this.config = config;
    this.httpClient = deps.httpClient ?? axios.create();
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Executes a request and decodes the body through `schema`
   */
  execute<S extends z.ZodTypeAny>(options: RequestOptions, schema: S): Promise<z.output<S>>;
  /**
   * Executes a request whose body carries nothing but (optionally) the error envelope
   */
  execute(options: RequestOptions): Promise<void>;
  async execute(options: RequestOptions, schema?: z.ZodTypeAny): Promise<unknown> {
    const { method, path } = options;
    const data = options.body === undefined ? undefined : this.encode(options.body);

    this.logger.requestSending({ method, path });
    const startedAt = Date.now();

    let response: AxiosResponse<unknown>;
    try {
      response = await this.httpClient.request<unknown>({
        method,
        url: path,
        baseURL: this.config.baseUrl,
        params: compactQuery(options.query),
        data,
        headers: {
          Accept: 'application/json',
          'X-Postmark-Server-Token': this.config.serverToken,
          ...(data !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        timeout: this.config.timeout,
        responseType: 'text',
        // Keep the raw text; decoding happens below
        transformResponse: [(raw: unknown) => raw],
        validateStatus: () => true,
      });
    } catch (error) {
      const transportError = toTransportError(error);
      this.logger.requestFailed({
        method,
        path,
        duration: Date.now() - startedAt,
        error: transportError.message,
      });
      throw transportError;
    }

    const duration = Date.now() - startedAt;
    const bodyText = readBodyText(response.data);

    if (response.status !== 200) {
      const envelope = parseProviderError(bodyText);
      this.logger.requestFailed({
        method,
        path,
        duration,
        http_status: response.status,
        error_code: envelope?.errorCode,
        error: envelope?.message || `unexpected status code: ${response.status}`,
      });
      throw new UnexpectedStatusError(response.status, bodyText, envelope);
    }

    this.logger.requestCompleted({ method, path, http_status: response.status, duration });

    if (!schema && !options.operation) {
      return undefined;
    }

    const json = this.parseJson(bodyText);

    if (options.operation) {
      const envelope = errorEnvelopeSchema.safeParse(json);
      if (!envelope.success) {
        throw new DecodingError(
          `failed to decode response: ${formatIssues(envelope.error)}`,
          bodyText,
          { cause: envelope.error }
        );
      }
      if (envelope.data.errorCode !== 0) {
        this.logger.requestRejected({
          operation: options.operation,
          method,
          path,
          error_code: envelope.data.errorCode,
          error: envelope.data.message,
        });
        throw new RemoteRejectionError(options.operation, envelope.data.errorCode, envelope.data.message);
      }
    }

    if (!schema) {
      return undefined;
    }

    const decoded = schema.safeParse(json);
    if (!decoded.success) {
      throw new DecodingError(
        `failed to decode response: ${formatIssues(decoded.error)}`,
        bodyText,
        { cause: decoded.error }
      );
    }
    return decoded.data;
  }

  private encode(body: unknown): string {
    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(body);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new EncodingError(`failed to marshal body: ${message}`, { cause: error });
    }
    if (encoded === undefined) {
      throw new EncodingError('failed to marshal body: value has no JSON representation');
    }
    return encoded;
  }

  private parseJson(bodyText: string): unknown {
    try {
      return JSON.parse(bodyText);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DecodingError(`failed to decode response: ${message}`, bodyText, { cause: error });
    }
  }
}

function compactQuery(
  query: Record<string, QueryValue> | undefined
): Record<string, string | number | boolean> | undefined {
  if (!query) {
    return undefined;
  }
  const params: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params[key] = value;
    }
  }
  return params;
}

function readBodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return '';
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return JSON.stringify(data);
}

function parseProviderError(bodyText: string): ErrorEnvelope | undefined {
  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch {
    // Not JSON (proxy error page, empty body); the raw text is still reported
    return undefined;
  }
  const parsed = providerErrorSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

function toTransportError(error: unknown): TransportError {
  if (axios.isAxiosError(error)) {
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new TransportError(`failed to send request: ${error.message}`, {
      code: error.code,
      timedOut,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`failed to send request: ${message}`, { cause: error });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
