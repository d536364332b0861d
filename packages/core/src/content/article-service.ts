import { err } from 'neverthrow';
import type { AccountId, Actor } from '../types/account.js';
import type { Article } from '../types/content.js';
import type { AccessEvaluator } from '../auth/rbac.js';
import { NotFoundError } from '../types/errors.js';
import type { ArticlePatch, ArticleRepository } from '../storage/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { authorize, found, parseInput, type ContentResult } from './errors.js';
import { articleInputSchema, articlePatchSchema } from './schemas.js';

export const AUTHOR_ARTICLES_LIMIT = 10;

export class ArticleService {
  constructor(
    private readonly articles: ArticleRepository,
    private readonly access: AccessEvaluator,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Drafts are visible to their author only; anyone else gets NotFound. */
  async getVisibleArticle(actor: Actor | null, id: number): ContentResult<Article> {
    const article = found(await this.articles.findById(id), 'Article');
    if (article.isErr()) return err(article.error);
    if (article.value.publishedAt === null && article.value.authorId !== actor?.id) {
      return err(new NotFoundError('Article not found'));
    }
    return article;
  }

  /** Published posts only, most recent first. */
  async listArticlesByAuthor(authorId: AccountId, limit: number = AUTHOR_ARTICLES_LIMIT): ContentResult<Article[]> {
    return this.articles.listByAuthor(authorId, limit);
  }

  async createArticle(actor: Actor | null, input: unknown): ContentResult<Article> {
    const author = authorize(this.access, actor, 'create_article');
    if (author.isErr()) return err(author.error);

    const parsed = parseInput(articleInputSchema, input);
    if (parsed.isErr()) return err(parsed.error);

    const { title, body, publish } = parsed.value;
    return this.articles.create({
      authorId: author.value.id,
      title,
      body,
      publishedAt: publish ? this.clock.now() : null,
    });
  }

  async editArticle(actor: Actor | null, id: number, input: unknown): ContentResult<Article> {
    const current = await this.articles.findById(id);
    if (current.isErr()) return err(current.error);

    const allowed = authorize(this.access, actor, 'edit_article', current.value);
    if (allowed.isErr()) return err(allowed.error);

    const parsed = parseInput(articlePatchSchema, input);
    if (parsed.isErr()) return err(parsed.error);

    const { publish, ...text } = parsed.value;
    const patch: ArticlePatch = { ...text, ...this.publicationPatch(current.value?.publishedAt ?? null, publish) };
    return found(await this.articles.update(id, patch), 'Article');
  }

  /** Publishing keeps the original date; unpublishing clears it. */
  private publicationPatch(publishedAt: Date | null, publish: boolean | undefined): Pick<ArticlePatch, 'publishedAt'> {
    if (publish === undefined) return {};
    if (!publish) return { publishedAt: null };
    return { publishedAt: publishedAt ?? this.clock.now() };
  }
}
