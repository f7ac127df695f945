/**
 * Structured Logger Service
 *
 * Structured JSON logging for calls against the Postmark API.
 *
 * Fields per request event:
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - method / path: HTTP method and relative path
 * - http_status: HTTP status code (when a response was received)
 * - error_code: provider error code (when the envelope carried one)
 * - duration: milliseconds spent on the exchange
 * - message: human-readable message
 *
 * Server tokens and request bodies are never logged.
 */

import pino from 'pino';
import { loadEnvFile, resolveLogSettings } from '../config/env.js';

/**
 * Log context for API request events
 */
export interface RequestLogContext {
  method?: string;
  path?: string;
  operation?: string;
  http_status?: number;
  error_code?: number;
  duration?: number;
  [key: string]: unknown;
}

let baseLogger: pino.Logger | undefined;

/**
 * Builds the base logger on first use, so importing the client reads no
 * environment
 */
function getBaseLogger(): pino.Logger {
  if (!baseLogger) {
    loadEnvFile();
    const settings = resolveLogSettings();

    baseLogger = pino({
      level: settings.level,

      formatters: {
        level: (label) => {
          return { level: label };
        },
      },

      base: {
        service: 'postmark-api-client',
        environment: settings.environment,
      },

      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

      // Pretty print only when NODE_ENV=development
      transport: settings.pretty ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          singleLine: false,
        },
      } : undefined,
    });
  }
  return baseLogger;
}

/**
 * Structured Logger
 *
 * Resolves its pino instance on the first log call.
 */
export class StructuredLogger {
  private resolve: () => pino.Logger;
  private resolved?: pino.Logger;

  constructor(logger: pino.Logger | (() => pino.Logger) = getBaseLogger) {
    if (typeof logger === 'function') {
      this.resolve = logger;
    } else {
      const instance = logger;
      this.resolve = () => instance;
    }
  }

  private get logger(): pino.Logger {
    if (!this.resolved) {
      this.resolved = this.resolve();
    }
    return this.resolved;
  }

  /**
   * Creates a child logger with additional context
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger(() => this.logger.child(bindings));
  }

  requestSending(context: RequestLogContext & { method: string; path: string }) {
    this.logger.debug({
      event: 'request.sending',
      method: context.method,
      path: context.path,
      message: `${context.method} ${context.path}`,
    });
  }

  requestCompleted(context: RequestLogContext & { method: string; path: string; http_status: number; duration: number }) {
    this.logger.info({
      event: 'request.completed',
      method: context.method,
      path: context.path,
      http_status: context.http_status,
      duration: context.duration,
      message: `${context.method} ${context.path} -> ${context.http_status} (${context.duration}ms)`,
    });
  }

  /**
   * Logs a request that produced no usable response
   * (transport failure, unexpected status, undecodable body)
   */
  requestFailed(context: RequestLogContext & { method: string; path: string; error: string }) {
    this.logger.error({
      event: 'request.failed',
      method: context.method,
      path: context.path,
      http_status: context.http_status,
      error_code: context.error_code,
      duration: context.duration,
      error: context.error,
      message: `${context.method} ${context.path} failed: ${context.error}`,
    });
  }

  /**
   * Logs an HTTP 200 response whose error envelope carried a non-zero code
   */
  requestRejected(context: RequestLogContext & { operation: string; error_code: number; error: string }) {
    this.logger.warn({
      event: 'request.rejected',
      operation: context.operation,
      method: context.method,
      path: context.path,
      error_code: context.error_code,
      error: context.error,
      message: `Postmark rejected ${context.operation} (code ${context.error_code}): ${context.error}`,
    });
  }

  /**
   * Generic info log
   */
  info(message: string, context?: RequestLogContext) {
    this.logger.info({ ...context, message });
  }

  /**
   * Generic warn log
   */
  warn(message: string, context?: RequestLogContext) {
    this.logger.warn({ ...context, message });
  }

  /**
   * Generic error log
   */
  error(message: string, context?: RequestLogContext & { error?: unknown }) {
    const error = context?.error;
    this.logger.error({
      ...context,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
      message,
    });
  }

  /**
   * Generic debug log
   */
  debug(message: string, context?: RequestLogContext) {
    this.logger.debug({ ...context, message });
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();

/**
 * Creates a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): StructuredLogger {
  return logger.child(context);
}
