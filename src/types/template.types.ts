/**
 * Template types
 */

/**
 * Template as stored by Postmark
 */
export interface Template {
  id: number;
  name: string;
  subject: string;
  htmlBody: string;
  textBody: string;
  alias?: string;
  active: boolean;
}

/**
 * Create/update payload. Update is a full replacement.
 */
export interface TemplateInput {
  name: string;
  subject: string;
  htmlBody: string;
  textBody: string;
  alias?: string;
  active?: boolean;
}

/**
 * Entry returned by the template listing
 */
export interface TemplateSummary {
  id: number;
  name: string;
  subject?: string;
  alias?: string;
  active: boolean;
}

export interface TemplateValidationInput {
  subject: string;
  htmlBody: string;
  textBody: string;
  testRenderModel?: Record<string, unknown>;
}

export interface TemplateValidationError {
  message: string;
  line?: number;
  characterPosition?: number;
}

export interface ContentValidation {
  contentIsValid: boolean;
  validationErrors: TemplateValidationError[];
  renderedContent?: string;
}

export interface TemplateValidationResult {
  allContentIsValid: boolean;
  subject?: ContentValidation;
  htmlBody?: ContentValidation;
  textBody?: ContentValidation;
  suggestedTemplateModel: Record<string, unknown>;
}
