import { ok, err } from 'neverthrow';
import type { Account, AccountId, ConfirmationToken, PresenceStatus, RoleName } from '../types/account.js';
import type { Article, Comment, News, Tip } from '../types/content.js';
import { StoreError } from '../types/errors.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import type {
  AccountRepository,
  ArticlePatch,
  ArticleRepository,
  CommentRepository,
  CommunityStore,
  ConfirmationRepository,
  NewAccount,
  NewArticle,
  NewComment,
  NewNews,
  NewTip,
  NewsPatch,
  NewsRepository,
  PresenceUpdate,
  RoleRepository,
  SessionRecord,
  SessionRepository,
  StoreResult,
  TipRepository,
} from './types.js';

// ---------------------------------------------------------------------------
// Shared tables
// ---------------------------------------------------------------------------

interface Tables {
  readonly accounts: Map<AccountId, Account>;
  /** code -> token */
  readonly confirmations: Map<string, ConfirmationToken>;
  readonly roles: Map<AccountId, Set<RoleName>>;
  readonly sessions: Map<string, SessionRecord>;
  readonly news: Map<number, News>;
  readonly articles: Map<number, Article>;
  readonly tips: Map<number, Tip>;
  readonly comments: Map<number, Comment>;
}

class Sequence {
  private next = 1;

  take(): number {
    return this.next++;
  }
}

function byNewest(a: Date | null, b: Date | null): number {
  return (b?.getTime() ?? 0) - (a?.getTime() ?? 0);
}

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

class MemoryAccountRepository implements AccountRepository {
  private readonly ids = new Sequence();

  constructor(
    private readonly tables: Tables,
    private readonly clock: Clock,
  ) {}

  async findById(id: AccountId): StoreResult<Account | null> {
    return ok(this.tables.accounts.get(id) ?? null);
  }

  async findByUsername(username: string): StoreResult<Account | null> {
    const wanted = username.toLowerCase();
    return ok(this.find((a) => a.username.toLowerCase() === wanted));
  }

  async findByEmail(email: string): StoreResult<Account | null> {
    const wanted = email.toLowerCase();
    return ok(this.find((a) => a.email.toLowerCase() === wanted));
  }

  async createPending(input: NewAccount, confirmationCode: string): StoreResult<Account> {
    if (this.find((a) => a.username.toLowerCase() === input.username.toLowerCase())) {
      return err(new StoreError('username already taken', 'conflict', 'username'));
    }
    if (this.find((a) => a.email.toLowerCase() === input.email.toLowerCase())) {
      return err(new StoreError('email already taken', 'conflict', 'email'));
    }
    if (this.tables.confirmations.has(confirmationCode)) {
      return err(new StoreError('confirmation code collision', 'conflict', 'code'));
    }

    const now = this.clock.now();
    const account: Account = {
      id: this.ids.take(),
      username: input.username,
      email: input.email,
      passwordHash: input.passwordHash,
      isConfirmed: false,
      lastLoginAt: null,
      lastActivityAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.accounts.set(account.id, account);
    this.tables.confirmations.set(confirmationCode, {
      code: confirmationCode,
      accountId: account.id,
      createdAt: now,
    });
    return ok(account);
  }

  async updatePresence(id: AccountId, update: PresenceUpdate): StoreResult<void> {
    const current = this.tables.accounts.get(id);
    if (current) {
      this.tables.accounts.set(id, {
        ...current,
        lastActivityAt: update.lastActivityAt,
        lastLoginAt: update.lastLoginAt ?? current.lastLoginAt,
      });
    }
    return ok(undefined);
  }

  async search(text: string, limit: number): StoreResult<Account[]> {
    const needle = text.toLowerCase();
    const matches = [...this.tables.accounts.values()]
      .filter((a) => a.username.toLowerCase().includes(needle))
      .sort((a, b) => a.username.localeCompare(b.username));
    return ok(matches.slice(0, limit));
  }

  async listByPresence(status: PresenceStatus, cutoff: Date, limit: number): StoreResult<Account[]> {
    const all = [...this.tables.accounts.values()];
    const threshold = cutoff.getTime();

    if (status === 'online') {
      return ok(
        all
          .filter((a) => a.lastActivityAt !== null && a.lastActivityAt.getTime() >= threshold)
          .sort((a, b) => byNewest(a.lastActivityAt, b.lastActivityAt))
          .slice(0, limit),
      );
    }

    return ok(
      all
        .filter((a) => a.lastActivityAt === null || a.lastActivityAt.getTime() < threshold)
        .sort((a, b) => a.username.localeCompare(b.username))
        .slice(0, limit),
    );
  }

  private find(predicate: (account: Account) => boolean): Account | null {
    for (const account of this.tables.accounts.values()) {
      if (predicate(account)) return account;
    }
    return null;
  }
}

class MemoryConfirmationRepository implements ConfirmationRepository {
  constructor(
    private readonly tables: Tables,
    private readonly clock: Clock,
  ) {}

  async findByAccount(accountId: AccountId): StoreResult<ConfirmationToken | null> {
    for (const token of this.tables.confirmations.values()) {
      if (token.accountId === accountId) return ok(token);
    }
    return ok(null);
  }

  async consume(code: string): StoreResult<Account | null> {
    // Lookup and delete happen with no await in between.
    const token = this.tables.confirmations.get(code);
    if (!token) return ok(null);
    this.tables.confirmations.delete(code);

    const account = this.tables.accounts.get(token.accountId);
    if (!account) return ok(null);

    const confirmed: Account = { ...account, isConfirmed: true, updatedAt: this.clock.now() };
    this.tables.accounts.set(confirmed.id, confirmed);
    return ok(confirmed);
  }
}

class MemoryRoleRepository implements RoleRepository {
  constructor(private readonly tables: Tables) {}

  async rolesOf(accountId: AccountId): StoreResult<RoleName[]> {
    return ok([...(this.tables.roles.get(accountId) ?? [])].sort());
  }
}

class MemorySessionRepository implements SessionRepository {
  constructor(private readonly tables: Tables) {}

  async create(record: SessionRecord): StoreResult<void> {
    this.tables.sessions.set(record.tokenHash, record);
    return ok(undefined);
  }

  async find(tokenHash: string): StoreResult<SessionRecord | null> {
    return ok(this.tables.sessions.get(tokenHash) ?? null);
  }

  async delete(tokenHash: string): StoreResult<void> {
    this.tables.sessions.delete(tokenHash);
    return ok(undefined);
  }
}

class MemoryNewsRepository implements NewsRepository {
  private readonly ids = new Sequence();

  constructor(
    private readonly tables: Tables,
    private readonly clock: Clock,
  ) {}

  async create(input: NewNews): StoreResult<News> {
    const now = this.clock.now();
    const news: News = { id: this.ids.take(), ...input, isApproved: false, createdAt: now, updatedAt: now };
    this.tables.news.set(news.id, news);
    return ok(news);
  }

  async findById(id: number): StoreResult<News | null> {
    return ok(this.tables.news.get(id) ?? null);
  }

  async update(id: number, patch: NewsPatch): StoreResult<News | null> {
    const current = this.tables.news.get(id);
    if (!current) return ok(null);
    const next: News = {
      ...current,
      title: patch.title ?? current.title,
      body: patch.body ?? current.body,
      updatedAt: this.clock.now(),
    };
    this.tables.news.set(id, next);
    return ok(next);
  }

  async approve(id: number): StoreResult<News | null> {
    const current = this.tables.news.get(id);
    if (!current) return ok(null);
    const next: News = { ...current, isApproved: true, updatedAt: this.clock.now() };
    this.tables.news.set(id, next);
    return ok(next);
  }

  async listApproved(limit: number): StoreResult<News[]> {
    return ok(
      [...this.tables.news.values()]
        .filter((n) => n.isApproved)
        .sort((a, b) => byNewest(a.createdAt, b.createdAt) || b.id - a.id)
        .slice(0, limit),
    );
  }
}

class MemoryArticleRepository implements ArticleRepository {
  private readonly ids = new Sequence();

  constructor(
    private readonly tables: Tables,
    private readonly clock: Clock,
  ) {}

  async create(input: NewArticle): StoreResult<Article> {
    const now = this.clock.now();
    const article: Article = { id: this.ids.take(), ...input, createdAt: now, updatedAt: now };
    this.tables.articles.set(article.id, article);
    return ok(article);
  }

  async findById(id: number): StoreResult<Article | null> {
    return ok(this.tables.articles.get(id) ?? null);
  }

  async update(id: number, patch: ArticlePatch): StoreResult<Article | null> {
    const current = this.tables.articles.get(id);
    if (!current) return ok(null);
    const next: Article = {
      ...current,
      title: patch.title ?? current.title,
      body: patch.body ?? current.body,
      publishedAt: patch.publishedAt === undefined ? current.publishedAt : patch.publishedAt,
      updatedAt: this.clock.now(),
    };
    this.tables.articles.set(id, next);
    return ok(next);
  }

  async listByAuthor(authorId: AccountId, limit: number): StoreResult<Article[]> {
    return ok(
      [...this.tables.articles.values()]
        .filter((a) => a.authorId === authorId && a.publishedAt !== null)
        .sort((a, b) => byNewest(a.publishedAt, b.publishedAt) || b.id - a.id)
        .slice(0, limit),
    );
  }
}

class MemoryTipRepository implements TipRepository {
  private readonly ids = new Sequence();

  constructor(
    private readonly tables: Tables,
    private readonly clock: Clock,
  ) {}

  async create(input: NewTip): StoreResult<Tip> {
    const tip: Tip = { id: this.ids.take(), ...input, createdAt: this.clock.now() };
    this.tables.tips.set(tip.id, tip);
    return ok(tip);
  }

  async findById(id: number): StoreResult<Tip | null> {
    return ok(this.tables.tips.get(id) ?? null);
  }

  async update(id: number, body: string): StoreResult<Tip | null> {
    const current = this.tables.tips.get(id);
    if (!current) return ok(null);
    const next: Tip = { ...current, body };
    this.tables.tips.set(id, next);
    return ok(next);
  }

  async latest(limit: number): StoreResult<Tip[]> {
    return ok(
      [...this.tables.tips.values()]
        .sort((a, b) => byNewest(a.publishedAt, b.publishedAt) || b.id - a.id)
        .slice(0, limit),
    );
  }
}

class MemoryCommentRepository implements CommentRepository {
  private readonly ids = new Sequence();

  constructor(
    private readonly tables: Tables,
    private readonly clock: Clock,
  ) {}

  async create(input: NewComment): StoreResult<Comment> {
    const now = this.clock.now();
    const comment: Comment = { id: this.ids.take(), ...input, createdAt: now, updatedAt: now };
    this.tables.comments.set(comment.id, comment);
    return ok(comment);
  }

  async findById(id: number): StoreResult<Comment | null> {
    return ok(this.tables.comments.get(id) ?? null);
  }

  async update(id: number, body: string): StoreResult<Comment | null> {
    const current = this.tables.comments.get(id);
    if (!current) return ok(null);
    const next: Comment = { ...current, body, updatedAt: this.clock.now() };
    this.tables.comments.set(id, next);
    return ok(next);
  }

  async listByArticle(articleId: number): StoreResult<Comment[]> {
    return ok(
      [...this.tables.comments.values()]
        .filter((c) => c.articleId === articleId)
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id),
    );
  }
}

// ---------------------------------------------------------------------------
// MemoryStore
// ---------------------------------------------------------------------------

/**
 * In-process store used when no database is configured, and by tests.
 * Nothing survives a restart.
 */
export class MemoryStore implements CommunityStore {
  readonly kind = 'memory';
  readonly accounts: AccountRepository;
  readonly confirmations: ConfirmationRepository;
  readonly roles: RoleRepository;
  readonly sessions: SessionRepository;
  readonly news: NewsRepository;
  readonly articles: ArticleRepository;
  readonly tips: TipRepository;
  readonly comments: CommentRepository;

  private readonly tables: Tables = {
    accounts: new Map(),
    confirmations: new Map(),
    roles: new Map(),
    sessions: new Map(),
    news: new Map(),
    articles: new Map(),
    tips: new Map(),
    comments: new Map(),
  };

  constructor(clock: Clock = systemClock) {
    this.accounts = new MemoryAccountRepository(this.tables, clock);
    this.confirmations = new MemoryConfirmationRepository(this.tables, clock);
    this.roles = new MemoryRoleRepository(this.tables);
    this.sessions = new MemorySessionRepository(this.tables);
    this.news = new MemoryNewsRepository(this.tables, clock);
    this.articles = new MemoryArticleRepository(this.tables, clock);
    this.tips = new MemoryTipRepository(this.tables, clock);
    this.comments = new MemoryCommentRepository(this.tables, clock);
  }

  /** Role membership is administered out of band; this is the seeding hook. */
  grantRole(accountId: AccountId, role: RoleName): void {
    const held = this.tables.roles.get(accountId) ?? new Set<RoleName>();
    held.add(role);
    this.tables.roles.set(accountId, held);
  }

  get sessionCount(): number {
    return this.tables.sessions.size;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
