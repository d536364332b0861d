import { ok, type Result } from 'neverthrow';
import type { MailError } from '../types/errors.js';
import type { Mailer, MailMessage } from './types.js';

/** Development mailer: prints a one-line summary instead of delivering. */
export class LogMailer implements Mailer {
  readonly name = 'log';
  private sent = 0;

  async send(message: MailMessage): Promise<Result<string, MailError>> {
    this.sent += 1;
    const id = `log-${this.sent}`;
    // eslint-disable-next-line no-console
    console.log(`[mail] ${id} to=${message.to} subject="${message.subject}"`);
    return ok(id);
  }
}
