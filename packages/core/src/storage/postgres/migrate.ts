import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { ok, err, type Result } from 'neverthrow';
import { StoreError, errorMessage } from '../../types/errors.js';
import { runQuery, type Queryable } from './query.js';

export const SCHEMA_PATH = fileURLToPath(new URL('../../../sql/schema.sql', import.meta.url));

/** Applies the bundled schema. Every statement is idempotent. */
export async function migrate(db: Queryable, schemaPath: string = SCHEMA_PATH): Promise<Result<void, StoreError>> {
  let sql: string;
  try {
    sql = await readFile(schemaPath, 'utf-8');
  } catch (error: unknown) {
    return err(new StoreError(`Cannot read schema file ${schemaPath}: ${errorMessage(error)}`));
  }

  const applied = await runQuery(db, sql);
  if (applied.isErr()) return err(applied.error);
  return ok(undefined);
}
