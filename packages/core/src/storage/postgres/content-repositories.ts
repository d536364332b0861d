import { ok, err, type Result } from 'neverthrow';
import type { AccountId } from '../../types/account.js';
import type { Article, Comment, News, Tip } from '../../types/content.js';
import type {
  ArticlePatch,
  ArticleRepository,
  CommentRepository,
  NewArticle,
  NewComment,
  NewNews,
  NewTip,
  NewsPatch,
  NewsRepository,
  StoreResult,
  TipRepository,
} from '../types.js';
import { StoreError } from '../../types/errors.js';
import { runQuery, type Queryable } from './query.js';
import {
  toArticle,
  toComment,
  toNews,
  toTip,
  type ArticleRow,
  type CommentRow,
  type NewsRow,
  type TipRow,
} from './rows.js';

function first<R, T>(map: (row: R) => T): (rows: R[]) => T | null {
  return ([row]) => (row ? map(row) : null);
}

function single<T>(value: T | null, table: string): Result<T, StoreError> {
  return value ? ok(value) : err(new StoreError(`Insert into ${table} returned no row`));
}

// ---------------------------------------------------------------------------
// News
// ---------------------------------------------------------------------------

export class PgNewsRepository implements NewsRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: NewNews): StoreResult<News> {
    const rows = await runQuery<NewsRow>(
      this.db,
      'INSERT INTO news (author_id, title, body) VALUES ($1, $2, $3) RETURNING *',
      [input.authorId, input.title, input.body],
    );
    if (rows.isErr()) return err(rows.error);
    return single(first(toNews)(rows.value), 'news');
  }

  async findById(id: number): StoreResult<News | null> {
    const rows = await runQuery<NewsRow>(this.db, 'SELECT * FROM news WHERE id = $1', [id]);
    return rows.map(first(toNews));
  }

  async update(id: number, patch: NewsPatch): StoreResult<News | null> {
    const rows = await runQuery<NewsRow>(
      this.db,
      `
        UPDATE news
        SET title = COALESCE($2, title), body = COALESCE($3, body), updated_at = now()
        WHERE id = $1
        RETURNING *
      `,
      [id, patch.title ?? null, patch.body ?? null],
    );
    return rows.map(first(toNews));
  }

  async approve(id: number): StoreResult<News | null> {
    const rows = await runQuery<NewsRow>(
      this.db,
      'UPDATE news SET is_approved = true, updated_at = now() WHERE id = $1 RETURNING *',
      [id],
    );
    return rows.map(first(toNews));
  }

  async listApproved(limit: number): StoreResult<News[]> {
    const rows = await runQuery<NewsRow>(
      this.db,
      'SELECT * FROM news WHERE is_approved ORDER BY created_at DESC, id DESC LIMIT $1',
      [limit],
    );
    return rows.map((r) => r.map(toNews));
  }
}

// ---------------------------------------------------------------------------
// Articles
// ---------------------------------------------------------------------------

export class PgArticleRepository implements ArticleRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: NewArticle): StoreResult<Article> {
    const rows = await runQuery<ArticleRow>(
      this.db,
      'INSERT INTO articles (author_id, title, body, published_at) VALUES ($1, $2, $3, $4) RETURNING *',
      [input.authorId, input.title, input.body, input.publishedAt],
    );
    if (rows.isErr()) return err(rows.error);
    return single(first(toArticle)(rows.value), 'articles');
  }

  async findById(id: number): StoreResult<Article | null> {
    const rows = await runQuery<ArticleRow>(this.db, 'SELECT * FROM articles WHERE id = $1', [id]);
    return rows.map(first(toArticle));
  }

  /** `publishedAt` is only written when present in the patch; null unpublishes. */
  async update(id: number, patch: ArticlePatch): StoreResult<Article | null> {
    const rows = await runQuery<ArticleRow>(
      this.db,
      `
        UPDATE articles
        SET title = COALESCE($2, title),
            body = COALESCE($3, body),
            published_at = CASE WHEN $4::boolean THEN $5::timestamptz ELSE published_at END,
            updated_at = now()
        WHERE id = $1
        RETURNING *
      `,
      [id, patch.title ?? null, patch.body ?? null, patch.publishedAt !== undefined, patch.publishedAt ?? null],
    );
    return rows.map(first(toArticle));
  }

  async listByAuthor(authorId: AccountId, limit: number): StoreResult<Article[]> {
    const rows = await runQuery<ArticleRow>(
      this.db,
      `
        SELECT * FROM articles
        WHERE author_id = $1 AND published_at IS NOT NULL
        ORDER BY published_at DESC, id DESC
        LIMIT $2
      `,
      [authorId, limit],
    );
    return rows.map((r) => r.map(toArticle));
  }
}

// ---------------------------------------------------------------------------
// Tips
// ---------------------------------------------------------------------------

export class PgTipRepository implements TipRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: NewTip): StoreResult<Tip> {
    const rows = await runQuery<TipRow>(
      this.db,
      'INSERT INTO tips (author_id, body, published_at) VALUES ($1, $2, $3) RETURNING *',
      [input.authorId, input.body, input.publishedAt],
    );
    if (rows.isErr()) return err(rows.error);
    return single(first(toTip)(rows.value), 'tips');
  }

  async findById(id: number): StoreResult<Tip | null> {
    const rows = await runQuery<TipRow>(this.db, 'SELECT * FROM tips WHERE id = $1', [id]);
    return rows.map(first(toTip));
  }

  async update(id: number, body: string): StoreResult<Tip | null> {
    const rows = await runQuery<TipRow>(this.db, 'UPDATE tips SET body = $2 WHERE id = $1 RETURNING *', [id, body]);
    return rows.map(first(toTip));
  }

  async latest(limit: number): StoreResult<Tip[]> {
    const rows = await runQuery<TipRow>(
      this.db,
      'SELECT * FROM tips ORDER BY published_at DESC, id DESC LIMIT $1',
      [limit],
    );
    return rows.map((r) => r.map(toTip));
  }
}

// ---------------------------------------------------------------------------
// Comments
// ---------------------------------------------------------------------------

export class PgCommentRepository implements CommentRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: NewComment): StoreResult<Comment> {
    const rows = await runQuery<CommentRow>(
      this.db,
      'INSERT INTO comments (article_id, author_id, body) VALUES ($1, $2, $3) RETURNING *',
      [input.articleId, input.authorId, input.body],
    );
    if (rows.isErr()) return err(rows.error);
    return single(first(toComment)(rows.value), 'comments');
  }

  async findById(id: number): StoreResult<Comment | null> {
    const rows = await runQuery<CommentRow>(this.db, 'SELECT * FROM comments WHERE id = $1', [id]);
    return rows.map(first(toComment));
  }

  async update(id: number, body: string): StoreResult<Comment | null> {
    const rows = await runQuery<CommentRow>(
      this.db,
      'UPDATE comments SET body = $2, updated_at = now() WHERE id = $1 RETURNING *',
      [id, body],
    );
    return rows.map(first(toComment));
  }

  async listByArticle(articleId: number): StoreResult<Comment[]> {
    const rows = await runQuery<CommentRow>(
      this.db,
      'SELECT * FROM comments WHERE article_id = $1 ORDER BY created_at, id',
      [articleId],
    );
    return rows.map((r) => r.map(toComment));
  }
}
