import { ok, err, type Result } from 'neverthrow';
import type { QueryResult, QueryResultRow } from 'pg';
import { StoreError, errorMessage } from '../../types/errors.js';

/** The part of `pg.Pool` the repositories use. */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

const UNIQUE_VIOLATION = '23505';

/** Unique constraints and indexes are named after the column they guard. */
const CONSTRAINT_FIELDS: ReadonlyArray<[fragment: string, field: string]> = [
  ['username', 'username'],
  ['email', 'email'],
  ['code', 'code'],
];

function readStringProp(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'string' ? prop : undefined;
}

export function toStoreError(error: unknown): StoreError {
  if (readStringProp(error, 'code') === UNIQUE_VIOLATION) {
    const constraint = readStringProp(error, 'constraint') ?? '';
    const match = CONSTRAINT_FIELDS.find(([fragment]) => constraint.includes(fragment));
    return new StoreError(`Unique constraint violated: ${constraint || 'unknown'}`, 'conflict', match?.[1]);
  }
  return new StoreError(`Database query failed: ${errorMessage(error)}`);
}

export async function runQuery<R extends QueryResultRow>(
  db: Queryable,
  text: string,
  values: unknown[] = [],
): Promise<Result<R[], StoreError>> {
  try {
    const result = await db.query<R>(text, values);
    return ok(result.rows);
  } catch (error: unknown) {
    return err(toStoreError(error));
  }
}

/** `%`, `_` and `\` are literal in user search text. */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
