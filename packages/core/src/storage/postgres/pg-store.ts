import type { CommunityStore } from '../types.js';
import type { Queryable } from './query.js';
import { PgAccountRepository, PgConfirmationRepository, PgRoleRepository } from './account-repositories.js';
import { PgSessionRepository } from './session-repository.js';
import {
  PgArticleRepository,
  PgCommentRepository,
  PgNewsRepository,
  PgTipRepository,
} from './content-repositories.js';

export interface PgPoolLike extends Queryable {
  end(): Promise<void>;
}

export class PgStore implements CommunityStore {
  readonly kind = 'postgres';
  readonly accounts: PgAccountRepository;
  readonly confirmations: PgConfirmationRepository;
  readonly roles: PgRoleRepository;
  readonly sessions: PgSessionRepository;
  readonly news: PgNewsRepository;
  readonly articles: PgArticleRepository;
  readonly tips: PgTipRepository;
  readonly comments: PgCommentRepository;

  constructor(private readonly pool: PgPoolLike) {
    this.accounts = new PgAccountRepository(pool);
    this.confirmations = new PgConfirmationRepository(pool);
    this.roles = new PgRoleRepository(pool);
    this.sessions = new PgSessionRepository(pool);
    this.news = new PgNewsRepository(pool);
    this.articles = new PgArticleRepository(pool);
    this.tips = new PgTipRepository(pool);
    this.comments = new PgCommentRepository(pool);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
