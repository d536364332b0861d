import type { Result } from 'neverthrow';
import type { Account, AccountId, ConfirmationToken, PresenceStatus, RoleName } from '../types/account.js';
import type { Article, Comment, News, Tip } from '../types/content.js';
import type { StoreError } from '../types/errors.js';

/**
 * Persistence seams. Every operation returns Result<T, StoreError>; a
 * `conflict` StoreError signals a unique-constraint collision.
 */

export type StoreResult<T> = Promise<Result<T, StoreError>>;

// ---------------------------------------------------------------------------
// Accounts
// ---------------------------------------------------------------------------

export interface NewAccount {
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
}

export interface PresenceUpdate {
  readonly lastActivityAt: Date;
  readonly lastLoginAt?: Date;
}

export interface AccountRepository {
  findById(id: AccountId): StoreResult<Account | null>;
  /** Case-insensitive. */
  findByUsername(username: string): StoreResult<Account | null>;
  /** Case-insensitive. */
  findByEmail(email: string): StoreResult<Account | null>;

  /**
   * Creates an unconfirmed account together with its confirmation code, as
   * one atomic write.
   */
  createPending(input: NewAccount, confirmationCode: string): StoreResult<Account>;

  /** Writes presence timestamps without bumping `updatedAt`. */
  updatePresence(id: AccountId, update: PresenceUpdate): StoreResult<void>;

  /** Case-insensitive substring match on username, ordered by username. */
  search(text: string, limit: number): StoreResult<Account[]>;

  /**
   * `online`: lastActivityAt >= cutoff, most recent first.
   * `offline`: never active or lastActivityAt < cutoff, ordered by username.
   */
  listByPresence(status: PresenceStatus, cutoff: Date, limit: number): StoreResult<Account[]>;
}

export interface ConfirmationRepository {
  findByAccount(accountId: AccountId): StoreResult<ConfirmationToken | null>;

  /**
   * Atomically deletes the token matching `code` and marks its account
   * confirmed. Returns the confirmed account, or null when no token matched.
   * Concurrent calls with the same code succeed at most once.
   */
  consume(code: string): StoreResult<Account | null>;
}

export interface RoleRepository {
  rolesOf(accountId: AccountId): StoreResult<RoleName[]>;
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export interface SessionRecord {
  /** SHA-256 of the bearer token; the raw token is never stored. */
  readonly tokenHash: string;
  readonly accountId: AccountId;
  readonly persistent: boolean;
  readonly expiresAt: Date;
  readonly createdAt: Date;
}

export interface SessionRepository {
  create(record: SessionRecord): StoreResult<void>;
  find(tokenHash: string): StoreResult<SessionRecord | null>;
  delete(tokenHash: string): StoreResult<void>;
}

// ---------------------------------------------------------------------------
// Content
// ---------------------------------------------------------------------------

export interface NewNews {
  readonly authorId: AccountId;
  readonly title: string;
  readonly body: string;
}

export interface NewsPatch {
  readonly title?: string;
  readonly body?: string;
}

export interface NewsRepository {
  create(input: NewNews): StoreResult<News>;
  findById(id: number): StoreResult<News | null>;
  update(id: number, patch: NewsPatch): StoreResult<News | null>;
  approve(id: number): StoreResult<News | null>;
  /** Approved news, newest first. */
  listApproved(limit: number): StoreResult<News[]>;
}

export interface NewArticle {
  readonly authorId: AccountId;
  readonly title: string;
  readonly body: string;
  readonly publishedAt: Date | null;
}

export interface ArticlePatch {
  readonly title?: string;
  readonly body?: string;
  readonly publishedAt?: Date | null;
}

export interface ArticleRepository {
  create(input: NewArticle): StoreResult<Article>;
  findById(id: number): StoreResult<Article | null>;
  update(id: number, patch: ArticlePatch): StoreResult<Article | null>;
  /** Published articles of one author, most recently published first. */
  listByAuthor(authorId: AccountId, limit: number): StoreResult<Article[]>;
}

export interface NewTip {
  readonly authorId: AccountId;
  readonly body: string;
  readonly publishedAt: Date;
}

export interface TipRepository {
  create(input: NewTip): StoreResult<Tip>;
  findById(id: number): StoreResult<Tip | null>;
  update(id: number, body: string): StoreResult<Tip | null>;
  /** Most recently published first. */
  latest(limit: number): StoreResult<Tip[]>;
}

export interface NewComment {
  readonly authorId: AccountId;
  readonly articleId: number;
  readonly body: string;
}

export interface CommentRepository {
  create(input: NewComment): StoreResult<Comment>;
  findById(id: number): StoreResult<Comment | null>;
  update(id: number, body: string): StoreResult<Comment | null>;
  /** Oldest first. */
  listByArticle(articleId: number): StoreResult<Comment[]>;
}

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

export interface CommunityStore {
  readonly kind: 'memory' | 'postgres';
  readonly accounts: AccountRepository;
  readonly confirmations: ConfirmationRepository;
  readonly roles: RoleRepository;
  readonly sessions: SessionRepository;
  readonly news: NewsRepository;
  readonly articles: ArticleRepository;
  readonly tips: TipRepository;
  readonly comments: CommentRepository;
  close(): Promise<void>;
}
