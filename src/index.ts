export { PostmarkApiProvider, createPostmarkProviderFromEnv } from './providers/postmark-api.provider.js';
export type { PostmarkProviderDeps } from './providers/postmark-api.provider.js';
export type { IPostmarkProvider } from './providers/postmark.provider.interface.js';
export { RequestExecutor } from './services/request-executor.service.js';
export type { RequestExecutorConfig, RequestOptions } from './services/request-executor.service.js';
export { classifyError, classifyStatus, isRetryableError } from './services/error-classification.service.js';
export type { ErrorCategory, ErrorClassification } from './services/error-classification.service.js';
export { StructuredLogger, logger, createLogger } from './services/logger.service.js';
export {
  PostmarkClientError,
  ConfigurationError,
  InvalidArgumentError,
  EncodingError,
  TransportError,
  UnexpectedStatusError,
  DecodingError,
  RemoteRejectionError,
  NOT_FOUND_ERROR_CODES,
} from './errors/postmark.errors.js';
export type {
  Template,
  TemplateInput,
  TemplateSummary,
  TemplateValidationInput,
  TemplateValidationError,
  TemplateValidationResult,
  ContentValidation,
} from './types/template.types.js';
export type { InlineEmail, TemplatedEmail, SendResult, BatchSendResult } from './types/email.types.js';
export type { Bounce, BounceFilter } from './types/bounce.types.js';
export type { PostmarkClientConfig, Page, HttpMethod, QueryValue } from './types/client.types.js';
