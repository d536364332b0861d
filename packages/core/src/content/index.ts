export { TipService, LATEST_TIPS_LIMIT } from './tip-service.js';
export { NewsService, APPROVED_NEWS_LIMIT } from './news-service.js';
export { ArticleService, AUTHOR_ARTICLES_LIMIT } from './article-service.js';
export { CommentService } from './comment-service.js';
export { AccountDirectory, DIRECTORY_LIMIT } from './account-directory.js';
export type { Profile } from './account-directory.js';
export { BlogService, BLOG_POSTS_LIMIT } from './blog.js';
export type { BlogView } from './blog.js';
export { authorize, parseInput, found } from './errors.js';
export type { ContentError, ContentResult } from './errors.js';
export {
  newsInputSchema,
  newsPatchSchema,
  articleInputSchema,
  articlePatchSchema,
  tipInputSchema,
  commentInputSchema,
} from './schemas.js';
export type { NewsInput, ArticleInput } from './schemas.js';
