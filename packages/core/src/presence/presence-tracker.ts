import { ok, type Result } from 'neverthrow';
import type { Account, AccountId } from '../types/account.js';
import type { StoreError } from '../types/errors.js';
import type { AccountRepository } from '../storage/types.js';
import { systemClock, type Clock } from '../utils/clock.js';

/** An account counts as online when its last qualifying request is this recent. */
export const PRESENCE_WINDOW_SECONDS = 120;

const WINDOW_MS = PRESENCE_WINDOW_SECONDS * 1000;

type PresenceFields = Pick<Account, 'id' | 'lastActivityAt'>;

/**
 * Maintains `lastActivityAt` / `lastLoginAt` with write throttling: activity is
 * recorded at most once per presence window.
 */
export class PresenceTracker {
  constructor(
    private readonly accounts: Pick<AccountRepository, 'updatePresence'>,
    private readonly clock: Clock = systemClock,
  ) {}

  isOnline(account: Pick<Account, 'lastActivityAt'>, asOf: Date = this.clock.now()): boolean {
    if (!account.lastActivityAt) return false;
    return asOf.getTime() - account.lastActivityAt.getTime() <= WINDOW_MS;
  }

  /** Accounts active at or after this instant are online. */
  onlineCutoff(): Date {
    return new Date(this.clock.now().getTime() - WINDOW_MS);
  }

  /**
   * Records activity unless the account was already seen inside the window.
   * Resolves to true when a write happened.
   */
  async touchActivity(account: PresenceFields): Promise<Result<boolean, StoreError>> {
    const now = this.clock.now();
    if (account.lastActivityAt && now.getTime() - account.lastActivityAt.getTime() <= WINDOW_MS) {
      return ok(false);
    }
    const written = await this.accounts.updatePresence(account.id, { lastActivityAt: now });
    return written.map(() => true);
  }

  async touchLogin(accountId: AccountId): Promise<Result<Date, StoreError>> {
    const now = this.clock.now();
    const written = await this.accounts.updatePresence(accountId, { lastActivityAt: now, lastLoginAt: now });
    return written.map(() => now);
  }
}
