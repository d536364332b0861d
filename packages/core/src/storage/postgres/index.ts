export { createPgPool } from './pg-pool.js';
export { runQuery, toStoreError, escapeLike } from './query.js';
export type { Queryable } from './query.js';
export { PgStore } from './pg-store.js';
export type { PgPoolLike } from './pg-store.js';
export { PgAccountRepository, PgConfirmationRepository, PgRoleRepository } from './account-repositories.js';
export { PgSessionRepository } from './session-repository.js';
export { PgNewsRepository, PgArticleRepository, PgTipRepository, PgCommentRepository } from './content-repositories.js';
export { migrate, SCHEMA_PATH } from './migrate.js';
