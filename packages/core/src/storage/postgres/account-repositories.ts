import { ok, err } from 'neverthrow';
import type { Account, AccountId, ConfirmationToken, PresenceStatus, RoleName } from '../../types/account.js';
import { isRoleName } from '../../types/account.js';
import type {
  AccountRepository,
  ConfirmationRepository,
  NewAccount,
  PresenceUpdate,
  RoleRepository,
  StoreResult,
} from '../types.js';
import { StoreError } from '../../types/errors.js';
import { escapeLike, runQuery, type Queryable } from './query.js';
import { toAccount, type UserRow } from './rows.js';

export class PgAccountRepository implements AccountRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: AccountId): StoreResult<Account | null> {
    const rows = await runQuery<UserRow>(this.db, 'SELECT * FROM users WHERE id = $1', [id]);
    return rows.map(firstAccount);
  }

  async findByUsername(username: string): StoreResult<Account | null> {
    const rows = await runQuery<UserRow>(this.db, 'SELECT * FROM users WHERE lower(username) = lower($1)', [username]);
    return rows.map(firstAccount);
  }

  async findByEmail(email: string): StoreResult<Account | null> {
    const rows = await runQuery<UserRow>(this.db, 'SELECT * FROM users WHERE lower(email) = lower($1)', [email]);
    return rows.map(firstAccount);
  }

  /** One statement, so the account and its code commit or fail together. */
  async createPending(input: NewAccount, confirmationCode: string): StoreResult<Account> {
    const rows = await runQuery<UserRow>(
      this.db,
      `
        WITH account AS (
          INSERT INTO users (username, email, password_hash)
          VALUES ($1, $2, $3)
          RETURNING *
        ), token AS (
          INSERT INTO user_confirmations (code, user_id)
          SELECT $4, id FROM account
        )
        SELECT * FROM account
      `,
      [input.username, input.email, input.passwordHash, confirmationCode],
    );
    if (rows.isErr()) return err(rows.error);

    const account = firstAccount(rows.value);
    return account ? ok(account) : err(new StoreError('Account insert returned no row'));
  }

  async updatePresence(id: AccountId, update: PresenceUpdate): StoreResult<void> {
    const rows = await runQuery(
      this.db,
      `
        UPDATE users
        SET last_activity_at = $2,
            last_login_at = COALESCE($3, last_login_at)
        WHERE id = $1
      `,
      [id, update.lastActivityAt, update.lastLoginAt ?? null],
    );
    return rows.map(() => undefined);
  }

  async search(text: string, limit: number): StoreResult<Account[]> {
    const rows = await runQuery<UserRow>(
      this.db,
      `SELECT * FROM users WHERE username ILIKE $1 ESCAPE '\\' ORDER BY username LIMIT $2`,
      [`%${escapeLike(text)}%`, limit],
    );
    return rows.map((r) => r.map(toAccount));
  }

  async listByPresence(status: PresenceStatus, cutoff: Date, limit: number): StoreResult<Account[]> {
    const sql =
      status === 'online'
        ? 'SELECT * FROM users WHERE last_activity_at >= $1 ORDER BY last_activity_at DESC LIMIT $2'
        : 'SELECT * FROM users WHERE last_activity_at IS NULL OR last_activity_at < $1 ORDER BY username LIMIT $2';
    const rows = await runQuery<UserRow>(this.db, sql, [cutoff, limit]);
    return rows.map((r) => r.map(toAccount));
  }
}

export class PgConfirmationRepository implements ConfirmationRepository {
  constructor(private readonly db: Queryable) {}

  async findByAccount(accountId: AccountId): StoreResult<ConfirmationToken | null> {
    const rows = await runQuery<{ code: string; user_id: number; created_at: Date }>(
      this.db,
      'SELECT code, user_id, created_at FROM user_confirmations WHERE user_id = $1 LIMIT 1',
      [accountId],
    );
    return rows.map(([row]) => (row ? { code: row.code, accountId: row.user_id, createdAt: row.created_at } : null));
  }

  /**
   * The DELETE claims the code; of two concurrent calls only one gets the
   * row back, so only one confirms.
   */
  async consume(code: string): StoreResult<Account | null> {
    const rows = await runQuery<UserRow>(
      this.db,
      `
        WITH consumed AS (
          DELETE FROM user_confirmations
          WHERE code = $1
          RETURNING user_id
        )
        UPDATE users
        SET is_confirmed = true, updated_at = now()
        FROM consumed
        WHERE users.id = consumed.user_id
        RETURNING users.*
      `,
      [code],
    );
    return rows.map(firstAccount);
  }
}

export class PgRoleRepository implements RoleRepository {
  constructor(private readonly db: Queryable) {}

  async rolesOf(accountId: AccountId): StoreResult<RoleName[]> {
    const rows = await runQuery<{ name: string }>(
      this.db,
      `
        SELECT r.name
        FROM roles r
        JOIN user_role ur ON ur.role_id = r.id
        WHERE ur.user_id = $1
        ORDER BY r.name
      `,
      [accountId],
    );
    return rows.map((r) => r.map((row) => row.name).filter(isRoleName));
  }
}

function firstAccount(rows: UserRow[]): Account | null {
  const [row] = rows;
  return row ? toAccount(row) : null;
}
