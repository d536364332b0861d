import { ok, err, type Result } from 'neverthrow';
import type { CommonroomConfig } from './types/config.js';
import { AccessEvaluator } from './auth/rbac.js';
import { PasswordHasher } from './auth/password.js';
import { SessionService } from './auth/session-service.js';
import { ActorResolver } from './auth/actor-resolver.js';
import { PresenceTracker } from './presence/presence-tracker.js';
import { RegistrationWorkflow } from './registration/registration-workflow.js';
import { MailQueue } from './mail/mail-queue.js';
import { createMailer } from './mail/factory.js';
import type { Mailer } from './mail/types.js';
import { createStore } from './storage/factory.js';
import type { CommunityStore } from './storage/types.js';
import { TipService } from './content/tip-service.js';
import { NewsService } from './content/news-service.js';
import { ArticleService } from './content/article-service.js';
import { CommentService } from './content/comment-service.js';
import { AccountDirectory } from './content/account-directory.js';
import { BlogService } from './content/blog.js';
import { systemClock, type Clock } from './utils/clock.js';

/** Every service a request handler needs, wired against one store. */
export interface CommunityRuntime {
  readonly config: CommonroomConfig;
  readonly store: CommunityStore;
  readonly access: AccessEvaluator;
  readonly presence: PresenceTracker;
  readonly sessions: SessionService;
  readonly actors: ActorResolver;
  readonly mail: MailQueue;
  readonly registration: RegistrationWorkflow;
  readonly tips: TipService;
  readonly news: NewsService;
  readonly articles: ArticleService;
  readonly comments: CommentService;
  readonly directory: AccountDirectory;
  readonly blog: BlogService;
  /** Waits for queued mail, then releases the store. */
  close(): Promise<void>;
}

export interface RuntimeOptions {
  /** Overrides the store chosen from `config.database`. */
  store?: CommunityStore;
  /** Overrides the mailer chosen from `config.mail`. */
  mailer?: Mailer;
  clock?: Clock;
  /** Replaces the fail delay sleep; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
}

export class RuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeError';
  }
}

export function createRuntime(
  config: CommonroomConfig,
  options: RuntimeOptions = {},
): Result<CommunityRuntime, RuntimeError> {
  const clock = options.clock ?? systemClock;

  let mailer = options.mailer;
  if (!mailer) {
    const created = createMailer(config.mail);
    if (created.isErr()) {
      return err(new RuntimeError(`Mailer setup failed: ${created.error.message}`));
    }
    mailer = created.value;
  }

  const store = options.store ?? createStore(config.database, clock);
  const access = new AccessEvaluator();
  const presence = new PresenceTracker(store.accounts, clock);
  const sessions = new SessionService(store.sessions, config.auth, clock);
  const mail = new MailQueue(mailer, config.site, config.mail.from);

  const articles = new ArticleService(store.articles, access, clock);

  const registration = new RegistrationWorkflow({
    accounts: store.accounts,
    confirmations: store.confirmations,
    sessions,
    presence,
    hasher: new PasswordHasher(config.auth.bcryptRounds),
    mail,
    settings: config.auth,
    sleep: options.sleep,
  });

  return ok({
    config,
    store,
    access,
    presence,
    sessions,
    actors: new ActorResolver(sessions, store.accounts, store.roles, presence),
    mail,
    registration,
    tips: new TipService(store.tips, access, clock),
    news: new NewsService(store.news, access),
    articles,
    comments: new CommentService(store.comments, articles, access),
    directory: new AccountDirectory(store.accounts, store.roles, presence),
    blog: new BlogService(store.accounts, store.articles, access),
    async close() {
      await mail.drain();
      await store.close();
    },
  });
}
