import type {
  Template,
  TemplateInput,
  TemplateSummary,
  TemplateValidationInput,
  TemplateValidationResult,
} from '../types/template.types.js';
import type { InlineEmail, TemplatedEmail, SendResult, BatchSendResult } from '../types/email.types.js';
import type { Bounce, BounceFilter } from '../types/bounce.types.js';
import type { Page } from '../types/client.types.js';

/**
 * Postmark Provider Interface
 *
 * The one client surface for templates, email dispatch and bounces.
 * Every method rejects with a PostmarkClientError subclass on failure.
 */
export interface IPostmarkProvider {
  /**
   * Creates a template
   * @returns Identifier assigned by Postmark
   */
  createTemplate(template: TemplateInput): Promise<number>;

  /**
   * Replaces every field of an existing template
   */
  updateTemplate(id: number, template: TemplateInput): Promise<void>;

  deleteTemplate(id: number): Promise<void>;

  getTemplate(id: number): Promise<Template>;

  /**
   * Lists one page of templates; `count` and `offset` are passed through
   */
  listTemplates(offset: number, count: number): Promise<Page<TemplateSummary>>;

  /**
   * Walks every page of templates
   */
  listAllTemplates(pageSize?: number): Promise<TemplateSummary[]>;

  /**
   * Asks Postmark to render and check template content without storing it
   */
  validateTemplate(template: TemplateValidationInput): Promise<TemplateValidationResult>;

  sendEmail(email: InlineEmail): Promise<SendResult>;

  sendEmailWithTemplate(email: TemplatedEmail): Promise<SendResult>;

  /**
   * Sends several templated emails in one call.
   * Per-message rejections are reported in the results, in input order.
   */
  sendBatchWithTemplates(emails: TemplatedEmail[]): Promise<BatchSendResult[]>;

  listBounces(offset: number, count: number, filter?: BounceFilter): Promise<Page<Bounce>>;

  getBounce(id: number): Promise<Bounce>;

  /**
   * Reactivates the recipient of a bounce (only when `canActivate` is set)
   */
  activateBounce(id: number): Promise<Bounce>;
}
