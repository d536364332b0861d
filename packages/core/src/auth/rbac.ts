import type { AccountId, Actor, RoleName } from '../types/account.js';
import type { OwnedResource } from '../types/content.js';
import { ForbiddenError, NotFoundError, UnauthenticatedError } from '../types/errors.js';
import type { AccessDecision, AccessPolicy, Action, DenialReason, ViewerFlags } from './types.js';

// ---------------------------------------------------------------------------
// Policy table
// ---------------------------------------------------------------------------

const AUTHENTICATED: AccessPolicy = { kind: 'authenticated' };

function ownership(...elevated: RoleName[]): AccessPolicy {
  return { kind: 'ownership', elevated: new Set(elevated) };
}

function role(...roles: RoleName[]): AccessPolicy {
  return { kind: 'role', roles: new Set(roles) };
}

/**
 * Maps each action to how it is gated. Kept explicit so callers (and the
 * access check endpoint) can inspect it.
 */
export const ACCESS_POLICIES: Readonly<Record<Action, AccessPolicy>> = {
  edit_terms: AUTHENTICATED,
  create_news: AUTHENTICATED,
  create_article: AUTHENTICATED,
  create_tip: AUTHENTICATED,
  create_comment: AUTHENTICATED,
  edit_news: ownership(),
  edit_article: ownership('administrator'),
  edit_comment: ownership('administrator', 'moderator'),
  edit_tip: ownership('administrator', 'librarian'),
  approve_news: role('administrator', 'moderator'),
  edit_roles: role('administrator'),
};

const ALLOW: AccessDecision = { allowed: true };

function deny(reason: DenialReason): AccessDecision {
  return { allowed: false, reason };
}

// ---------------------------------------------------------------------------
// AccessEvaluator
// ---------------------------------------------------------------------------

export class AccessEvaluator {
  private readonly policies: Readonly<Record<Action, AccessPolicy>>;

  constructor(policies: Readonly<Record<Action, AccessPolicy>> = ACCESS_POLICIES) {
    this.policies = policies;
  }

  /**
   * Decides whether `actor` may perform `action` on `resource`.
   *
   * Anonymous actors are always denied with `unauthenticated`. For
   * ownership-gated actions a missing resource is `not_found`, so callers
   * can tell it apart from `forbidden`.
   */
  canPerform(actor: Actor | null, action: Action, resource?: OwnedResource | null): AccessDecision {
    if (!actor) {
      return deny('unauthenticated');
    }

    const policy = this.policies[action];
    switch (policy.kind) {
      case 'authenticated':
        return ALLOW;
      case 'role':
        return hasAnyRole(actor, policy.roles) ? ALLOW : deny('forbidden');
      case 'ownership':
        if (!resource) {
          return deny('not_found');
        }
        if (resource.authorId === actor.id) {
          return ALLOW;
        }
        return hasAnyRole(actor, policy.elevated) ? ALLOW : deny('forbidden');
    }
  }

  /**
   * Pre-computes the flags a blog or profile page needs for the account
   * identified by `ownerId`.
   */
  describeViewerFlags(actor: Actor | null, ownerId: AccountId): ViewerFlags {
    const isOwner = actor !== null && actor.id === ownerId;
    return {
      isOwner,
      canCreateArticle: isOwner && this.canPerform(actor, 'create_article').allowed,
    };
  }
}

/** Union semantics: any matching role grants access. */
export function hasAnyRole(actor: Actor, roles: ReadonlySet<RoleName>): boolean {
  for (const held of actor.roles) {
    if (roles.has(held)) return true;
  }
  return false;
}

export type AccessError = UnauthenticatedError | ForbiddenError | NotFoundError;

export function denialToError(reason: DenialReason): AccessError {
  switch (reason) {
    case 'unauthenticated':
      return new UnauthenticatedError();
    case 'forbidden':
      return new ForbiddenError();
    case 'not_found':
      return new NotFoundError();
  }
}
