import { err } from 'neverthrow';
import type { Actor } from '../types/account.js';
import type { Comment } from '../types/content.js';
import type { AccessEvaluator } from '../auth/rbac.js';
import type { CommentRepository } from '../storage/types.js';
import type { ArticleService } from './article-service.js';
import { authorize, found, parseInput, type ContentResult } from './errors.js';
import { commentInputSchema } from './schemas.js';

export class CommentService {
  constructor(
    private readonly comments: CommentRepository,
    private readonly articles: Pick<ArticleService, 'getVisibleArticle'>,
    private readonly access: AccessEvaluator,
  ) {}

  /** Comments on a draft exist only for the draft's author. */
  async listComments(actor: Actor | null, articleId: number): ContentResult<Comment[]> {
    const article = await this.articles.getVisibleArticle(actor, articleId);
    if (article.isErr()) return err(article.error);
    return this.comments.listByArticle(articleId);
  }

  async createComment(actor: Actor | null, articleId: number, input: unknown): ContentResult<Comment> {
    const author = authorize(this.access, actor, 'create_comment');
    if (author.isErr()) return err(author.error);

    const article = await this.articles.getVisibleArticle(author.value, articleId);
    if (article.isErr()) return err(article.error);

    const parsed = parseInput(commentInputSchema, input);
    if (parsed.isErr()) return err(parsed.error);

    return this.comments.create({ authorId: author.value.id, articleId, body: parsed.value.body });
  }

  async editComment(actor: Actor | null, id: number, input: unknown): ContentResult<Comment> {
    const current = await this.comments.findById(id);
    if (current.isErr()) return err(current.error);

    const allowed = authorize(this.access, actor, 'edit_comment', current.value);
    if (allowed.isErr()) return err(allowed.error);

    const parsed = parseInput(commentInputSchema, input);
    if (parsed.isErr()) return err(parsed.error);

    return found(await this.comments.update(id, parsed.value.body), 'Comment');
  }
}
