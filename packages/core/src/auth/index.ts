export type { Action, AccessDecision, AccessPolicy, DenialReason, ViewerFlags } from './types.js';
export { ACTIONS, isAction } from './types.js';

export { AccessEvaluator, ACCESS_POLICIES, hasAnyRole, denialToError } from './rbac.js';
export type { AccessError } from './rbac.js';
export { PasswordHasher, DEFAULT_BCRYPT_ROUNDS } from './password.js';
export { SessionService, hashSessionToken } from './session-service.js';
export type { SessionSettings, OpenedSession } from './session-service.js';
export { ActorResolver } from './actor-resolver.js';
