import { ok, err } from 'neverthrow';
import type { Account, AccountId, RoleName } from '../types/account.js';
import type { PresenceTracker } from '../presence/presence-tracker.js';
import type { AccountRepository, RoleRepository } from '../storage/types.js';
import { found, type ContentResult } from './errors.js';

export const DIRECTORY_LIMIT = 50;

export interface Profile {
  readonly account: Account;
  readonly roles: RoleName[];
  readonly online: boolean;
}

/** Read-only views over accounts: profiles, search and presence lists. */
export class AccountDirectory {
  constructor(
    private readonly accounts: AccountRepository,
    private readonly roles: RoleRepository,
    private readonly presence: PresenceTracker,
  ) {}

  async findProfile(username: string): ContentResult<Profile> {
    const account = found(await this.accounts.findByUsername(username), 'User');
    if (account.isErr()) return err(account.error);
    return this.profileOf(account.value);
  }

  async findProfileById(id: AccountId): ContentResult<Profile> {
    const account = found(await this.accounts.findById(id), 'User');
    if (account.isErr()) return err(account.error);
    return this.profileOf(account.value);
  }

  async searchAccounts(text: string, limit: number = DIRECTORY_LIMIT): ContentResult<Account[]> {
    const needle = text.trim();
    if (needle.length === 0) return ok([]);
    return this.accounts.search(needle, limit);
  }

  async listOnline(limit: number = DIRECTORY_LIMIT): ContentResult<Account[]> {
    return this.accounts.listByPresence('online', this.presence.onlineCutoff(), limit);
  }

  /** Includes accounts that have never been active. */
  async listOffline(limit: number = DIRECTORY_LIMIT): ContentResult<Account[]> {
    return this.accounts.listByPresence('offline', this.presence.onlineCutoff(), limit);
  }

  private async profileOf(account: Account): ContentResult<Profile> {
    const roles = await this.roles.rolesOf(account.id);
    if (roles.isErr()) return err(roles.error);
    return ok({ account, roles: roles.value, online: this.presence.isOnline(account) });
  }
}
