export type {
  StoreResult,
  NewAccount,
  PresenceUpdate,
  AccountRepository,
  ConfirmationRepository,
  RoleRepository,
  SessionRecord,
  SessionRepository,
  NewNews,
  NewsPatch,
  NewsRepository,
  NewArticle,
  ArticlePatch,
  ArticleRepository,
  NewTip,
  TipRepository,
  NewComment,
  CommentRepository,
  CommunityStore,
} from './types.js';

export { MemoryStore } from './memory-store.js';
export { createStore } from './factory.js';
export * from './postgres/index.js';
