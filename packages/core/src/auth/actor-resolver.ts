import { ok, err, type Result } from 'neverthrow';
import type { Actor } from '../types/account.js';
import type { StoreError } from '../types/errors.js';
import type { AccountRepository, RoleRepository } from '../storage/types.js';
import type { PresenceTracker } from '../presence/presence-tracker.js';
import type { SessionService } from './session-service.js';

/**
 * Turns a session token into an Actor. Every successful resolution counts as a
 * qualifying request for presence.
 */
export class ActorResolver {
  constructor(
    private readonly sessions: SessionService,
    private readonly accounts: Pick<AccountRepository, 'findById'>,
    private readonly roles: RoleRepository,
    private readonly presence: PresenceTracker,
  ) {}

  async resolve(token: string | null | undefined): Promise<Result<Actor | null, StoreError>> {
    if (!token) return ok(null);

    const session = await this.sessions.resolve(token);
    if (session.isErr()) return err(session.error);
    if (session.value === null) return ok(null);

    const account = await this.accounts.findById(session.value);
    if (account.isErr()) return err(account.error);
    if (!account.value) return ok(null);

    const roles = await this.roles.rolesOf(account.value.id);
    if (roles.isErr()) return err(roles.error);

    const touched = await this.presence.touchActivity(account.value);
    if (touched.isErr()) {
      // eslint-disable-next-line no-console
      console.error(`[presence] Failed to record activity for account ${account.value.id}: ${touched.error.message}`);
    }

    return ok({
      id: account.value.id,
      username: account.value.username,
      roles: new Set(roles.value),
    });
  }
}
