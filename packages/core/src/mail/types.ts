import type { Result } from 'neverthrow';
import type { MailError } from '../types/errors.js';

export interface MailMessage {
  readonly from: string;
  readonly to: string;
  readonly subject: string;
  readonly text: string;
  readonly html: string;
}

/** Delivers one message. Resolves to the provider's message id. */
export interface Mailer {
  readonly name: string;
  send(message: MailMessage): Promise<Result<string, MailError>>;
}

/** Data each template needs, keyed by template name. */
export interface MailTemplateData {
  registration: { username: string; code: string };
}

export type MailTemplateName = keyof MailTemplateData;

/** Fire-and-forget dispatch: callers never wait for, or hear about, delivery. */
export interface MailDispatcher {
  enqueue<K extends MailTemplateName>(template: K, recipient: string, data: MailTemplateData[K]): void;
}
