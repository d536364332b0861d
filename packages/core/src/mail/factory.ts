import { ok, err, type Result } from 'neverthrow';
import type { MailConfig } from '../types/config.js';
import { ConfigError } from '../types/errors.js';
import { LogMailer } from './log-mailer.js';
import { ResendMailer } from './resend-mailer.js';
import type { Mailer } from './types.js';

export function createMailer(config: MailConfig): Result<Mailer, ConfigError> {
  switch (config.provider) {
    case 'log':
      return ok(new LogMailer());
    case 'resend':
      if (!config.apiKey) {
        return err(new ConfigError('mail.apiKey is required when mail.provider is "resend"'));
      }
      return ok(new ResendMailer(config.apiKey));
  }
}
