import { createHash, randomBytes } from 'node:crypto';
import { ok, err, type Result } from 'neverthrow';
import type { AccountId } from '../types/account.js';
import type { StoreError } from '../types/errors.js';
import type { SessionRepository } from '../storage/types.js';
import { systemClock, type Clock } from '../utils/clock.js';

export interface SessionSettings {
  readonly sessionTtlMinutes: number;
  readonly rememberTtlDays: number;
}

export interface OpenedSession {
  /** Raw bearer token. Only its hash is persisted. */
  readonly token: string;
  readonly expiresAt: Date;
  readonly persistent: boolean;
}

const TOKEN_BYTES = 32;

export function hashSessionToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

export class SessionService {
  constructor(
    private readonly sessions: SessionRepository,
    private readonly settings: SessionSettings,
    private readonly clock: Clock = systemClock,
  ) {}

  async open(accountId: AccountId, options: { persistent: boolean }): Promise<Result<OpenedSession, StoreError>> {
    const now = this.clock.now();
    const ttlMs = options.persistent
      ? this.settings.rememberTtlDays * 24 * 60 * 60 * 1000
      : this.settings.sessionTtlMinutes * 60 * 1000;
    const token = randomBytes(TOKEN_BYTES).toString('base64url');
    const expiresAt = new Date(now.getTime() + ttlMs);

    const created = await this.sessions.create({
      tokenHash: hashSessionToken(token),
      accountId,
      persistent: options.persistent,
      expiresAt,
      createdAt: now,
    });
    return created.map(() => ({ token, expiresAt, persistent: options.persistent }));
  }

  /** Account id of a live session; expired sessions are removed on sight. */
  async resolve(token: string): Promise<Result<AccountId | null, StoreError>> {
    const tokenHash = hashSessionToken(token);
    const found = await this.sessions.find(tokenHash);
    if (found.isErr()) return err(found.error);

    const record = found.value;
    if (!record) return ok(null);

    if (record.expiresAt.getTime() <= this.clock.now().getTime()) {
      const removed = await this.sessions.delete(tokenHash);
      if (removed.isErr()) return err(removed.error);
      return ok(null);
    }
    return ok(record.accountId);
  }

  close(token: string): Promise<Result<void, StoreError>> {
    return this.sessions.delete(hashSessionToken(token));
  }
}
