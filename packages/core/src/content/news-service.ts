import { err } from 'neverthrow';
import type { Actor } from '../types/account.js';
import type { News } from '../types/content.js';
import type { AccessEvaluator } from '../auth/rbac.js';
import type { NewsRepository } from '../storage/types.js';
import { authorize, found, parseInput, type ContentResult } from './errors.js';
import { newsInputSchema, newsPatchSchema } from './schemas.js';

export const APPROVED_NEWS_LIMIT = 20;

/** News is submitted unapproved and shown once a moderator approves it. */
export class NewsService {
  constructor(
    private readonly news: NewsRepository,
    private readonly access: AccessEvaluator,
  ) {}

  async listApprovedNews(limit: number = APPROVED_NEWS_LIMIT): ContentResult<News[]> {
    return this.news.listApproved(limit);
  }

  async createNews(actor: Actor | null, input: unknown): ContentResult<News> {
    const author = authorize(this.access, actor, 'create_news');
    if (author.isErr()) return err(author.error);

    const parsed = parseInput(newsInputSchema, input);
    if (parsed.isErr()) return err(parsed.error);

    return this.news.create({ authorId: author.value.id, ...parsed.value });
  }

  async editNews(actor: Actor | null, id: number, input: unknown): ContentResult<News> {
    const current = await this.news.findById(id);
    if (current.isErr()) return err(current.error);

    const allowed = authorize(this.access, actor, 'edit_news', current.value);
    if (allowed.isErr()) return err(allowed.error);

    const parsed = parseInput(newsPatchSchema, input);
    if (parsed.isErr()) return err(parsed.error);

    return found(await this.news.update(id, parsed.value), 'News');
  }

  async approveNews(actor: Actor | null, id: number): ContentResult<News> {
    const allowed = authorize(this.access, actor, 'approve_news');
    if (allowed.isErr()) return err(allowed.error);

    return found(await this.news.approve(id), 'News');
  }
}
