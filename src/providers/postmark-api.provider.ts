import type { AxiosInstance } from 'axios';
import type { IPostmarkProvider } from './postmark.provider.interface.js';
import type {
  Template,
  TemplateInput,
  TemplateSummary,
  TemplateValidationInput,
  TemplateValidationResult,
} from '../types/template.types.js';
import type { InlineEmail, TemplatedEmail, SendResult, BatchSendResult } from '../types/email.types.js';
import type { Bounce, BounceFilter } from '../types/bounce.types.js';
import type { Page, PostmarkClientConfig } from '../types/client.types.js';
import { ConfigurationError, InvalidArgumentError } from '../errors/postmark.errors.js';
import {
  templateCreatedSchema,
  templateSchema,
  templateListSchema,
  templateValidationSchema,
  sendResultSchema,
  batchSendResultSchema,
  bounceSchema,
  bounceListSchema,
  bounceActivatedSchema,
} from '../schemas/postmark.schemas.js';
import { RequestExecutor } from '../services/request-executor.service.js';
import { logger as defaultLogger, type StructuredLogger } from '../services/logger.service.js';
import { getConfig, DEFAULT_POSTMARK_API_URL, DEFAULT_TIMEOUT_MS } from '../config/env.js';

const DEFAULT_PAGE_SIZE = 100;

export interface PostmarkProviderDeps {
  httpClient?: AxiosInstance;
  logger?: StructuredLogger;
}

/**
 * Postmark API Provider
 *
 * Implementation of IPostmarkProvider over the Postmark REST API.
 *
 * Success is judged per endpoint:
 * - create/update/delete template, single sends: HTTP 200 and ErrorCode 0
 * - get/list/validate template, batch send, bounces: HTTP 200 only
 *
 * No retries, no caching, no pagination beyond what the caller asks for.
 * Token and base URL are fixed at construction.
 */
export class PostmarkApiProvider implements IPostmarkProvider {
  private executor: RequestExecutor;
  private logger: StructuredLogger;

  constructor(config: PostmarkClientConfig, deps: PostmarkProviderDeps = {}) {
    const serverToken = config.serverToken.trim();
    if (!serverToken) {
      throw new ConfigurationError('serverToken is required');
    }

    this.logger = (deps.logger ?? defaultLogger).child({ provider: 'postmark' });
    this.executor = new RequestExecutor(
      {
        serverToken,
        baseUrl: (config.baseUrl ?? DEFAULT_POSTMARK_API_URL).replace(/\/+$/, ''),
        timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      },
      { httpClient: deps.httpClient, logger: this.logger }
    );
  }

  // ---------------------------------------------------------------------------
  // Templates
  // ---------------------------------------------------------------------------

  async createTemplate(template: TemplateInput): Promise<number> {
    const templateId = await this.executor.execute(
      { method: 'POST', path: '/templates', body: toTemplatePayload(template), operation: 'create template' },
      templateCreatedSchema
    );
    this.logger.info(`Created template ${templateId}`, { operation: 'create template' });
    return templateId;
  }

  async updateTemplate(id: number, template: TemplateInput): Promise<void> {
    await this.executor.execute({
      method: 'PUT',
      path: `/templates/${id}`,
      body: toTemplatePayload(template),
      operation: 'update template',
    });
  }

  async deleteTemplate(id: number): Promise<void> {
    await this.executor.execute({
      method: 'DELETE',
      path: `/templates/${id}`,
      operation: 'delete template',
    });
  }

  async getTemplate(id: number): Promise<Template> {
    return this.executor.execute({ method: 'GET', path: `/templates/${id}` }, templateSchema);
  }

  async listTemplates(offset: number, count: number): Promise<Page<TemplateSummary>> {
    return this.executor.execute(
      { method: 'GET', path: '/templates', query: { count, offset } },
      templateListSchema
    );
  }

  async listAllTemplates(pageSize: number = DEFAULT_PAGE_SIZE): Promise<TemplateSummary[]> {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new InvalidArgumentError(`pageSize must be a positive integer, got ${pageSize}`);
    }

    const templates: TemplateSummary[] = [];
    let offset = 0;

    while (true) {
      const page = await this.listTemplates(offset, pageSize);
      templates.push(...page.items);
      offset += pageSize;

      if (page.items.length === 0 || offset >= page.totalCount) {
        return templates;
      }
    }
  }

  async validateTemplate(template: TemplateValidationInput): Promise<TemplateValidationResult> {
    return this.executor.execute(
      {
        method: 'POST',
        path: '/templates/validate',
        body: {
          Subject: template.subject,
          HtmlBody: template.htmlBody,
          TextBody: template.textBody,
          TestRenderModel: template.testRenderModel,
        },
      },
      templateValidationSchema
    );
  }

  // ---------------------------------------------------------------------------
  // Email
  // ---------------------------------------------------------------------------

  async sendEmail(email: InlineEmail): Promise<SendResult> {
    return this.executor.execute(
      {
        method: 'POST',
        path: '/email',
        body: {
          From: email.from,
          To: email.to,
          Subject: email.subject,
          HtmlBody: email.htmlBody,
          TextBody: email.textBody,
          ReplyTo: email.replyTo,
          Tag: email.tag,
          MessageStream: email.messageStream,
        },
        operation: 'send email',
      },
      sendResultSchema
    );
  }

  async sendEmailWithTemplate(email: TemplatedEmail): Promise<SendResult> {
    return this.executor.execute(
      {
        method: 'POST',
        path: '/email/withTemplate',
        body: toTemplatedMessage(email),
        operation: 'send email with template',
      },
      sendResultSchema
    );
  }

  async sendBatchWithTemplates(emails: TemplatedEmail[]): Promise<BatchSendResult[]> {
    const results = await this.executor.execute(
      {
        method: 'POST',
        path: '/email/batchWithTemplates',
        body: { Messages: emails.map(toTemplatedMessage) },
      },
      batchSendResultSchema
    );

    const rejected = results.filter((result) => !result.accepted).length;
    if (rejected > 0) {
      this.logger.warn(`Batch send: ${rejected} of ${results.length} messages rejected`, {
        operation: 'send batch with templates',
      });
    }
    return results;
  }

  // ---------------------------------------------------------------------------
  // Bounces
  // ---------------------------------------------------------------------------

  async listBounces(offset: number, count: number, filter: BounceFilter = {}): Promise<Page<Bounce>> {
    return this.executor.execute(
      {
        method: 'GET',
        path: '/bounces',
        query: {
          count,
          offset,
          type: filter.type,
          inactive: filter.inactive,
          emailFilter: filter.emailFilter,
          tag: filter.tag,
          messageID: filter.messageId,
          fromdate: filter.fromDate,
          todate: filter.toDate,
        },
      },
      bounceListSchema
    );
  }

  async getBounce(id: number): Promise<Bounce> {
    return this.executor.execute({ method: 'GET', path: `/bounces/${id}` }, bounceSchema);
  }

  async activateBounce(id: number): Promise<Bounce> {
    return this.executor.execute({ method: 'PUT', path: `/bounces/${id}/activate` }, bounceActivatedSchema);
  }
}

/**
 * Builds a provider from POSTMARK_* environment variables, read on this call
 */
export function createPostmarkProviderFromEnv(deps: PostmarkProviderDeps = {}): PostmarkApiProvider {
  const envConfig = getConfig();
  if (!envConfig.postmarkServerToken) {
    throw new ConfigurationError('POSTMARK_SERVER_TOKEN is not set');
  }
  return new PostmarkApiProvider(
    {
      serverToken: envConfig.postmarkServerToken,
      baseUrl: envConfig.postmarkApiUrl,
      timeout: envConfig.postmarkTimeoutMs,
    },
    deps
  );
}

function toTemplatePayload(template: TemplateInput) {
  return {
    Name: template.name,
    Subject: template.subject,
    HtmlBody: template.htmlBody,
    TextBody: template.textBody,
    Alias: template.alias,
    Active: template.active,
  };
}

function toTemplatedMessage(email: TemplatedEmail) {
  return {
    From: email.from,
    To: email.to,
    TemplateId: email.templateId,
    TemplateAlias: email.templateAlias,
    TemplateModel: email.templateModel,
    ReplyTo: email.replyTo,
    Tag: email.tag,
    MessageStream: email.messageStream,
  };
}
