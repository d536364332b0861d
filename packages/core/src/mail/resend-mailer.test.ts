import { describe, it, expect, vi } from 'vitest';
import { ResendMailer } from './resend-mailer.js';
import { LogMailer } from './log-mailer.js';
import { createMailer } from './factory.js';

const MESSAGE = {
  from: 'noreply@commonroom.test',
  to: 'a@x.com',
  subject: 'Confirm your registration',
  text: 'hello',
  html: '<p>hello</p>',
};

describe('ResendMailer', () => {
  it('should pass the message through and return the id', async () => {
    const send = vi.fn().mockResolvedValue({ data: { id: 'msg_1' }, error: null });
    const mailer = new ResendMailer({ send });

    const result = await mailer.send(MESSAGE);

    expect(result._unsafeUnwrap()).toBe('msg_1');
    expect(send).toHaveBeenCalledWith(MESSAGE);
  });

  it('should map an api error to MailError', async () => {
    const send = vi.fn().mockResolvedValue({ data: null, error: { message: 'invalid from' } });
    const result = await new ResendMailer({ send }).send(MESSAGE);

    expect(result._unsafeUnwrapErr().name).toBe('MailError');
    expect(result._unsafeUnwrapErr().message).toBe('Resend rejected message to a@x.com: invalid from');
  });

  it('should map a thrown error to MailError', async () => {
    const send = vi.fn().mockRejectedValue(new Error('ECONNRESET'));
    const result = await new ResendMailer({ send }).send(MESSAGE);

    expect(result._unsafeUnwrapErr().message).toBe('Resend request failed: ECONNRESET');
  });
});

describe('LogMailer', () => {
  it('should log a one-line summary', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const result = await new LogMailer().send(MESSAGE);

    expect(result._unsafeUnwrap()).toBe('log-1');
    expect(consoleSpy).toHaveBeenCalledWith('[mail] log-1 to=a@x.com subject="Confirm your registration"');
    consoleSpy.mockRestore();
  });
});

describe('createMailer', () => {
  it('should default to the log mailer', () => {
    expect(createMailer({ provider: 'log', from: 'x@y.z' })._unsafeUnwrap().name).toBe('log');
  });

  it('should require an api key for resend', () => {
    const result = createMailer({ provider: 'resend', from: 'x@y.z' });
    expect(result._unsafeUnwrapErr().message).toBe('mail.apiKey is required when mail.provider is "resend"');
  });

  it('should build a resend mailer with a key', () => {
    expect(createMailer({ provider: 'resend', from: 'x@y.z', apiKey: 'test-secret' })._unsafeUnwrap().name).toBe('resend');
  });
});
