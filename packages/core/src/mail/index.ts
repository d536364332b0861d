export type { Mailer, MailMessage, MailDispatcher, MailTemplateData, MailTemplateName } from './types.js';
export { renderTemplate, confirmationUrl } from './templates.js';
export type { RenderedMail } from './templates.js';
export { LogMailer } from './log-mailer.js';
export { ResendMailer } from './resend-mailer.js';
export type { ResendEmails } from './resend-mailer.js';
export { MailQueue } from './mail-queue.js';
export { createMailer } from './factory.js';
