export type {
  AccountId,
  Account,
  RoleName,
  Actor,
  ConfirmationToken,
  PresenceStatus,
} from './account.js';
export { ROLE_NAMES, isRoleName } from './account.js';

export type { OwnedResource, News, Article, Tip, Comment } from './content.js';

export type {
  CommonroomConfig,
  SiteConfig,
  ServerConfig,
  DatabaseConfig,
  AuthConfig,
  MailConfig,
  MailProviderName,
  DocsConfig,
} from './config.js';

export type { FieldErrors, StoreErrorKind, ConfigErrorReason } from './errors.js';
export {
  ValidationError,
  UnauthenticatedError,
  ForbiddenError,
  NotFoundError,
  InvalidTokenError,
  InvalidCredentialsError,
  StoreError,
  MailError,
  ConfigError,
  errorMessage,
} from './errors.js';
