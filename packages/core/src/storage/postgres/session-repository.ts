import type { SessionRecord, SessionRepository, StoreResult } from '../types.js';
import { runQuery, type Queryable } from './query.js';
import { toSession, type SessionRow } from './rows.js';

export class PgSessionRepository implements SessionRepository {
  constructor(private readonly db: Queryable) {}

  async create(record: SessionRecord): StoreResult<void> {
    const rows = await runQuery(
      this.db,
      `
        INSERT INTO sessions (token_hash, user_id, persistent, expires_at, created_at)
        VALUES ($1, $2, $3, $4, $5)
      `,
      [record.tokenHash, record.accountId, record.persistent, record.expiresAt, record.createdAt],
    );
    return rows.map(() => undefined);
  }

  async find(tokenHash: string): StoreResult<SessionRecord | null> {
    const rows = await runQuery<SessionRow>(this.db, 'SELECT * FROM sessions WHERE token_hash = $1', [tokenHash]);
    return rows.map(([row]) => (row ? toSession(row) : null));
  }

  async delete(tokenHash: string): StoreResult<void> {
    const rows = await runQuery(this.db, 'DELETE FROM sessions WHERE token_hash = $1', [tokenHash]);
    return rows.map(() => undefined);
  }
}
