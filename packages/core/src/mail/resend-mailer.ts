import { ok, err, type Result } from 'neverthrow';
import { Resend } from 'resend';
import { MailError, errorMessage } from '../types/errors.js';
import type { Mailer, MailMessage } from './types.js';

/** The slice of the Resend SDK this mailer calls. */
export interface ResendEmails {
  send(payload: {
    from: string;
    to: string;
    subject: string;
    text: string;
    html: string;
  }): Promise<{ data: { id: string } | null; error: { message: string } | null }>;
}

export class ResendMailer implements Mailer {
  readonly name = 'resend';
  private readonly emails: ResendEmails;

  constructor(apiKeyOrClient: string | ResendEmails) {
    this.emails = typeof apiKeyOrClient === 'string' ? new Resend(apiKeyOrClient).emails : apiKeyOrClient;
  }

  async send(message: MailMessage): Promise<Result<string, MailError>> {
    try {
      const { data, error } = await this.emails.send({
        from: message.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
      if (error) {
        return err(new MailError(`Resend rejected message to ${message.to}: ${error.message}`));
      }
      return ok(data?.id ?? '');
    } catch (error: unknown) {
      return err(new MailError(`Resend request failed: ${errorMessage(error)}`));
    }
  }
}
