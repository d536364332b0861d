import { describe, it, expect, vi } from 'vitest';
import { ok } from 'neverthrow';
import { createRuntime, RuntimeError } from './runtime.js';
import { defaultConfig } from './config/config-parser.js';
import { MemoryStore } from './storage/memory-store.js';
import { ManualClock } from './utils/clock.js';
import type { Mailer } from './mail/types.js';

describe('createRuntime', () => {
  it('should build a memory-backed runtime from the default config', async () => {
    const result = createRuntime(defaultConfig());

    expect(result.isOk()).toBe(true);
    const runtime = result._unsafeUnwrap();
    expect(runtime.store.kind).toBe('memory');
    await runtime.close();
  });

  it('should refuse a resend mailer without an api key', () => {
    const config = defaultConfig();
    const result = createRuntime({ ...config, mail: { ...config.mail, provider: 'resend' } });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(RuntimeError);
    expect(result._unsafeUnwrapErr().message).toBe(
      'Mailer setup failed: mail.apiKey is required when mail.provider is "resend"',
    );
  });

  it('should wire registration, mail and actor resolution together', async () => {
    const clock = new ManualClock('2024-01-01T00:00:00.000Z');
    const store = new MemoryStore(clock);
    const send = vi.fn<Mailer['send']>().mockResolvedValue(ok('m-1'));
    const config = defaultConfig();
    const runtime = createRuntime(
      { ...config, auth: { ...config.auth, bcryptRounds: 4 } },
      { store, clock, mailer: { name: 'mock', send } },
    )._unsafeUnwrap();

    await runtime.registration.register({ username: 'alice', email: 'a@x.com', password: 'secret123' });
    await runtime.close();

    expect(send).toHaveBeenCalledTimes(1);
    const code = (await store.confirmations.findByAccount(1))._unsafeUnwrap()?.code ?? '';
    expect(send.mock.calls[0]?.[0].text).toContain(`http://localhost:3000/auth/confirm/${code}`);

    const { session } = (await runtime.registration.confirm(code))._unsafeUnwrap();
    const actor = (await runtime.actors.resolve(session.token))._unsafeUnwrap();
    expect(actor?.username).toBe('alice');
  });
});
