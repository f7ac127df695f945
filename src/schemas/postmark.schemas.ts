/**
 * Response schemas for the Postmark API.
 *
 * Postmark answers with PascalCase JSON; each schema validates one response
 * shape and maps it onto the camelCase domain types.
 */

import { z } from 'zod';
import type {
  Template,
  TemplateSummary,
  TemplateValidationResult,
  ContentValidation,
} from '../types/template.types.js';
import type { SendResult, BatchSendResult } from '../types/email.types.js';
import type { Bounce } from '../types/bounce.types.js';
import type { Page } from '../types/client.types.js';

// Postmark sends null for unset strings
const optionalText = z.string().nullish().transform((value) => value ?? undefined);
const text = z.string().nullish().transform((value) => value ?? '');
const identifier = z.number().int();

/**
 * ErrorCode/Message pair carried by mutating responses.
 * A missing ErrorCode reads as 0 (success).
 */
export const errorEnvelopeSchema = z
  .object({
    ErrorCode: z.number().int().nullish(),
    Message: z.string().nullish(),
  })
  .transform((value) => ({
    errorCode: value.ErrorCode ?? 0,
    message: value.Message ?? '',
  }));

export type ErrorEnvelope = z.output<typeof errorEnvelopeSchema>;

/**
 * Body of a non-200 response, when Postmark explains the failure
 */
export const providerErrorSchema = z
  .object({
    ErrorCode: z.number().int(),
    Message: text,
  })
  .transform((value): ErrorEnvelope => ({
    errorCode: value.ErrorCode,
    message: value.Message,
  }));

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

export const templateCreatedSchema = z
  .object({ TemplateId: identifier.positive() })
  .transform((value) => value.TemplateId);

export const templateSchema = z
  .object({
    TemplateId: identifier,
    Name: z.string(),
    Subject: text,
    HtmlBody: text,
    TextBody: text,
    Alias: optionalText,
    Active: z.boolean().default(true),
  })
  .transform((value): Template => ({
    id: value.TemplateId,
    name: value.Name,
    subject: value.Subject,
    htmlBody: value.HtmlBody,
    textBody: value.TextBody,
    alias: value.Alias,
    active: value.Active,
  }));

const templateSummarySchema = z
  .object({
    TemplateId: identifier,
    Name: z.string(),
    Subject: optionalText,
    Alias: optionalText,
    Active: z.boolean().default(true),
  })
  .transform((value): TemplateSummary => ({
    id: value.TemplateId,
    name: value.Name,
    subject: value.Subject,
    alias: value.Alias,
    active: value.Active,
  }));

export const templateListSchema = z
  .object({
    TotalCount: z.number().int().nonnegative(),
    Templates: z.array(templateSummarySchema).nullish(),
  })
  .transform((value): Page<TemplateSummary> => ({
    totalCount: value.TotalCount,
    items: value.Templates ?? [],
  }));

const contentValidationSchema = z
  .object({
    ContentIsValid: z.boolean(),
    ValidationErrors: z
      .array(
        z.object({
          Message: z.string(),
          Line: z.number().int().optional(),
          CharacterPosition: z.number().int().optional(),
        }),
      )
      .nullish(),
    RenderedContent: optionalText,
  })
  .transform((value): ContentValidation => ({
    contentIsValid: value.ContentIsValid,
    validationErrors: (value.ValidationErrors ?? []).map((error) => ({
      message: error.Message,
      line: error.Line,
      characterPosition: error.CharacterPosition,
    })),
    renderedContent: value.RenderedContent,
  }));

export const templateValidationSchema = z
  .object({
    AllContentIsValid: z.boolean(),
    Subject: contentValidationSchema.nullish(),
    HtmlBody: contentValidationSchema.nullish(),
    TextBody: contentValidationSchema.nullish(),
    SuggestedTemplateModel: z.record(z.unknown()).nullish(),
  })
  .transform((value): TemplateValidationResult => ({
    allContentIsValid: value.AllContentIsValid,
    subject: value.Subject ?? undefined,
    htmlBody: value.HtmlBody ?? undefined,
    textBody: value.TextBody ?? undefined,
    suggestedTemplateModel: value.SuggestedTemplateModel ?? {},
  }));

// ---------------------------------------------------------------------------
// Email
// ---------------------------------------------------------------------------

export const sendResultSchema = z
  .object({
    To: z.string(),
    MessageID: z.string(),
    SubmittedAt: optionalText,
    ErrorCode: z.number().int().nullish(),
    Message: text,
  })
  .transform((value): SendResult => ({
    to: value.To,
    messageId: value.MessageID,
    submittedAt: value.SubmittedAt,
    errorCode: value.ErrorCode ?? 0,
    message: value.Message,
  }));

const batchEntrySchema = z
  .object({
    To: optionalText,
    MessageID: optionalText,
    SubmittedAt: optionalText,
    ErrorCode: z.number().int().nullish(),
    Message: text,
  })
  .transform((value): BatchSendResult => {
    const errorCode = value.ErrorCode ?? 0;
    return {
      to: value.To,
      messageId: value.MessageID,
      submittedAt: value.SubmittedAt,
      errorCode,
      message: value.Message,
      accepted: errorCode === 0,
    };
  });

export const batchSendResultSchema = z.array(batchEntrySchema);

// ---------------------------------------------------------------------------
// Bounces
// ---------------------------------------------------------------------------

export const bounceSchema = z
  .object({
    ID: identifier,
    Type: z.string(),
    TypeCode: z.number().int(),
    Description: text,
    Details: text,
    Email: z.string(),
    From: optionalText,
    BouncedAt: z.string(),
    Inactive: z.boolean(),
    CanActivate: z.boolean(),
    Subject: text,
    MessageID: z.string(),
    Tag: optionalText,
    MessageStream: optionalText,
  })
  .transform((value): Bounce => ({
    id: value.ID,
    type: value.Type,
    typeCode: value.TypeCode,
    description: value.Description,
    details: value.Details,
    email: value.Email,
    from: value.From,
    bouncedAt: value.BouncedAt,
    inactive: value.Inactive,
    canActivate: value.CanActivate,
    subject: value.Subject,
    messageId: value.MessageID,
    tag: value.Tag,
    messageStream: value.MessageStream,
  }));

export const bounceListSchema = z
  .object({
    TotalCount: z.number().int().nonnegative(),
    Bounces: z.array(bounceSchema).nullish(),
  })
  .transform((value): Page<Bounce> => ({
    totalCount: value.TotalCount,
    items: value.Bounces ?? [],
  }));

export const bounceActivatedSchema = z
  .object({
    Message: optionalText,
    Bounce: bounceSchema,
  })
  .transform((value) => value.Bounce);
