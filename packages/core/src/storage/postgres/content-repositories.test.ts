import { describe, it, expect, vi } from 'vitest';
import { PgArticleRepository, PgNewsRepository, PgTipRepository } from './content-repositories.js';
import { PgSessionRepository } from './session-repository.js';
import { PgStore } from './pg-store.js';
import { migrate } from './migrate.js';

function createMockDb(rows: unknown[] = []) {
  return { query: vi.fn().mockResolvedValue({ rows, rowCount: rows.length }) };
}

const T = new Date('2024-02-01T00:00:00.000Z');

describe('PgNewsRepository', () => {
  it('should create unapproved news', async () => {
    const db = createMockDb([
      { id: 5, author_id: 2, title: 'Release', body: 'Out now', is_approved: false, created_at: T, updated_at: T },
    ]);
    const news = (await new PgNewsRepository(db).create({ authorId: 2, title: 'Release', body: 'Out now' }))._unsafeUnwrap();

    expect(news).toEqual({ id: 5, authorId: 2, title: 'Release', body: 'Out now', isApproved: false, createdAt: T, updatedAt: T });
  });

  it('should fail when an insert returns nothing', async () => {
    const error = (await new PgNewsRepository(createMockDb()).create({ authorId: 2, title: 't', body: 'b' }))._unsafeUnwrapErr();
    expect(error.message).toBe('Insert into news returned no row');
  });
});

describe('PgArticleRepository', () => {
  it('should leave published_at alone when the patch omits it', async () => {
    const db = createMockDb();
    await new PgArticleRepository(db).update(3, { title: 'New title' });

    expect(db.query.mock.calls[0]?.[1]).toEqual([3, 'New title', null, false, null]);
  });

  it('should write an explicit null to unpublish', async () => {
    const db = createMockDb();
    await new PgArticleRepository(db).update(3, { publishedAt: null });

    expect(db.query.mock.calls[0]?.[1]).toEqual([3, null, null, true, null]);
  });
});

describe('PgTipRepository', () => {
  it('should pass the limit to latest', async () => {
    const db = createMockDb([{ id: 1, author_id: 1, body: 'Use strict mode', published_at: T, created_at: T }]);
    const tips = (await new PgTipRepository(db).latest(10))._unsafeUnwrap();

    expect(tips).toHaveLength(1);
    expect(tips[0]?.body).toBe('Use strict mode');
    expect(db.query.mock.calls[0]?.[1]).toEqual([10]);
  });
});

describe('PgSessionRepository', () => {
  it('should map a session row', async () => {
    const db = createMockDb([{ token_hash: 'abc', user_id: 7, persistent: true, expires_at: T, created_at: T }]);
    const record = (await new PgSessionRepository(db).find('abc'))._unsafeUnwrap();

    expect(record).toEqual({ tokenHash: 'abc', accountId: 7, persistent: true, expiresAt: T, createdAt: T });
  });
});

describe('PgStore', () => {
  it('should end the pool on close', async () => {
    const pool = { ...createMockDb(), end: vi.fn().mockResolvedValue(undefined) };
    const store = new PgStore(pool);

    await store.close();

    expect(store.kind).toBe('postgres');
    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});

describe('migrate', () => {
  it('should apply the bundled schema in one call', async () => {
    const db = createMockDb();

    const result = await migrate(db);

    expect(result.isOk()).toBe(true);
    const [sql] = db.query.mock.calls[0] ?? [];
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS users');
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS user_confirmations');
  });

  it('should report a missing schema file', async () => {
    const result = await migrate(createMockDb(), '/nonexistent/schema.sql');
    expect(result._unsafeUnwrapErr().message).toContain('Cannot read schema file /nonexistent/schema.sql');
  });
});
