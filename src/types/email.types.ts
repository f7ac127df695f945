/**
 * Email types
 */

interface EmailEnvelope {
  from: string;
  to: string;
  replyTo?: string;
  tag?: string;
  messageStream?: string;
}

/**
 * Email with subject and body given inline
 */
export interface InlineEmail extends EmailEnvelope {
  subject: string;
  htmlBody?: string;
  textBody?: string;
}

/**
 * Email rendered remotely from a stored template.
 * Exactly one of templateId / templateAlias identifies the template.
 */
export type TemplatedEmail = EmailEnvelope & {
  templateModel: Record<string, string>;
} & (
  | { templateId: number; templateAlias?: never }
  | { templateAlias: string; templateId?: never }
);

/**
 * Outcome of a single send
 */
export interface SendResult {
  to: string;
  messageId: string;
  submittedAt?: string;
  errorCode: number;
  message: string;
}

/**
 * Per-message outcome of a batch send, in input order
 */
export interface BatchSendResult {
  to?: string;
  messageId?: string;
  submittedAt?: string;
  errorCode: number;
  message: string;
  accepted: boolean;
}
