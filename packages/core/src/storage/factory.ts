import type { DatabaseConfig } from '../types/config.js';
import type { Clock } from '../utils/clock.js';
import { MemoryStore } from './memory-store.js';
import { createPgPool } from './postgres/pg-pool.js';
import { PgStore } from './postgres/pg-store.js';
import type { CommunityStore } from './types.js';

/** PostgreSQL when a database is configured, otherwise an in-memory store. */
export function createStore(database: DatabaseConfig | undefined, clock?: Clock): CommunityStore {
  if (database) {
    return new PgStore(createPgPool(database));
  }
  return new MemoryStore(clock);
}
