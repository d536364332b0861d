import { ok, err } from 'neverthrow';
import type { Account, Actor } from '../types/account.js';
import type { Article } from '../types/content.js';
import type { ViewerFlags } from '../auth/types.js';
import type { AccessEvaluator } from '../auth/rbac.js';
import type { AccountRepository, ArticleRepository } from '../storage/types.js';
import { found, type ContentResult } from './errors.js';

export const BLOG_POSTS_LIMIT = 10;

export interface BlogView {
  readonly owner: Account;
  readonly posts: Article[];
  readonly flags: ViewerFlags;
}

/** Assembles a user's blog page; owner controls are decided here, not in the template. */
export class BlogService {
  constructor(
    private readonly accounts: Pick<AccountRepository, 'findByUsername'>,
    private readonly articles: Pick<ArticleRepository, 'listByAuthor'>,
    private readonly access: AccessEvaluator,
  ) {}

  async buildBlog(actor: Actor | null, username: string, limit: number = BLOG_POSTS_LIMIT): ContentResult<BlogView> {
    const owner = found(await this.accounts.findByUsername(username), 'User');
    if (owner.isErr()) return err(owner.error);

    const posts = await this.articles.listByAuthor(owner.value.id, limit);
    if (posts.isErr()) return err(posts.error);

    return ok({
      owner: owner.value,
      posts: posts.value,
      flags: this.access.describeViewerFlags(actor, owner.value.id),
    });
  }
}
