import { describe, it, expect } from 'vitest';
import { AccessEvaluator, ACCESS_POLICIES, denialToError, hasAnyRole } from './rbac.js';
import { ACTIONS } from './types.js';
import type { Action } from './types.js';
import type { Actor, RoleName } from '../types/account.js';
import type { OwnedResource } from '../types/content.js';
import { ForbiddenError, NotFoundError, UnauthenticatedError } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createActor(id: number, roles: RoleName[] = []): Actor {
  return { id, username: `user-${id}`, roles: new Set(roles) };
}

function ownedBy(authorId: number): OwnedResource {
  return { authorId };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('AccessEvaluator', () => {
  const access = new AccessEvaluator();

  describe('anonymous actor', () => {
    it('should deny edit_article with unauthenticated', () => {
      expect(access.canPerform(null, 'edit_article', ownedBy(1))).toEqual({
        allowed: false,
        reason: 'unauthenticated',
      });
    });

    it('should deny every action with unauthenticated', () => {
      for (const action of ACTIONS) {
        expect(access.canPerform(null, action, ownedBy(1))).toEqual({
          allowed: false,
          reason: 'unauthenticated',
        });
      }
    });

    it('should report unauthenticated before not_found', () => {
      expect(access.canPerform(null, 'edit_news', null)).toEqual({
        allowed: false,
        reason: 'unauthenticated',
      });
    });
  });

  describe('authenticated-only actions', () => {
    it.each<Action>(['edit_terms', 'create_news', 'create_article', 'create_tip', 'create_comment'])(
      'should allow any signed-in actor to %s',
      (action) => {
        expect(access.canPerform(createActor(5), action)).toEqual({ allowed: true });
      },
    );
  });

  describe('edit_article', () => {
    it('should allow the author', () => {
      expect(access.canPerform(createActor(1), 'edit_article', ownedBy(1))).toEqual({ allowed: true });
    });

    it('should deny a non-owner without roles', () => {
      expect(access.canPerform(createActor(2), 'edit_article', ownedBy(1))).toEqual({
        allowed: false,
        reason: 'forbidden',
      });
    });

    it('should allow an administrator who is not the author', () => {
      const admin = createActor(2, ['administrator']);
      expect(access.canPerform(admin, 'edit_article', ownedBy(1))).toEqual({ allowed: true });
    });

    it('should deny a moderator who is not the author', () => {
      const moderator = createActor(2, ['moderator']);
      expect(access.canPerform(moderator, 'edit_article', ownedBy(1)).allowed).toBe(false);
    });

    it('should deny with not_found when the article is missing', () => {
      expect(access.canPerform(createActor(1), 'edit_article', null)).toEqual({
        allowed: false,
        reason: 'not_found',
      });
    });
  });

  describe('edit_news', () => {
    it('should allow only the author', () => {
      expect(access.canPerform(createActor(3), 'edit_news', ownedBy(3)).allowed).toBe(true);
    });

    it('should deny an administrator who is not the author', () => {
      const admin = createActor(4, ['administrator', 'moderator']);
      expect(access.canPerform(admin, 'edit_news', ownedBy(3))).toEqual({
        allowed: false,
        reason: 'forbidden',
      });
    });
  });

  describe('approve_news', () => {
    it('should allow administrators', () => {
      expect(access.canPerform(createActor(1, ['administrator']), 'approve_news').allowed).toBe(true);
    });

    it('should allow moderators', () => {
      expect(access.canPerform(createActor(1, ['moderator']), 'approve_news').allowed).toBe(true);
    });

    it('should deny librarians', () => {
      expect(access.canPerform(createActor(1, ['librarian']), 'approve_news')).toEqual({
        allowed: false,
        reason: 'forbidden',
      });
    });

    it('should allow when any of several roles matches', () => {
      const actor = createActor(1, ['librarian', 'moderator']);
      expect(access.canPerform(actor, 'approve_news').allowed).toBe(true);
    });
  });

  describe('edit_roles', () => {
    it('should allow administrators only', () => {
      expect(access.canPerform(createActor(1, ['administrator']), 'edit_roles').allowed).toBe(true);
      expect(access.canPerform(createActor(1, ['moderator']), 'edit_roles').allowed).toBe(false);
    });
  });

  describe('edit_tip and edit_comment', () => {
    it('should let librarians edit tips of others', () => {
      expect(access.canPerform(createActor(9, ['librarian']), 'edit_tip', ownedBy(1)).allowed).toBe(true);
    });

    it('should let moderators edit comments of others', () => {
      expect(access.canPerform(createActor(9, ['moderator']), 'edit_comment', ownedBy(1)).allowed).toBe(true);
    });

    it('should not let librarians edit comments of others', () => {
      expect(access.canPerform(createActor(9, ['librarian']), 'edit_comment', ownedBy(1)).allowed).toBe(false);
    });
  });

  describe('describeViewerFlags', () => {
    it('should mark the owner and allow article creation', () => {
      expect(access.describeViewerFlags(createActor(7), 7)).toEqual({
        isOwner: true,
        canCreateArticle: true,
      });
    });

    it('should give visitors no owner controls', () => {
      expect(access.describeViewerFlags(createActor(8), 7)).toEqual({
        isOwner: false,
        canCreateArticle: false,
      });
    });

    it('should give anonymous viewers no owner controls', () => {
      expect(access.describeViewerFlags(null, 7)).toEqual({
        isOwner: false,
        canCreateArticle: false,
      });
    });
  });

  it('should accept a custom policy table', () => {
    const strict = new AccessEvaluator({
      ...ACCESS_POLICIES,
      create_news: { kind: 'role', roles: new Set<RoleName>(['administrator']) },
    });
    expect(strict.canPerform(createActor(1), 'create_news').allowed).toBe(false);
  });
});

describe('hasAnyRole', () => {
  it('should return false for an actor without roles', () => {
    expect(hasAnyRole(createActor(1), new Set<RoleName>(['administrator']))).toBe(false);
  });

  it('should return false for an empty role set', () => {
    expect(hasAnyRole(createActor(1, ['administrator']), new Set<RoleName>())).toBe(false);
  });
});

describe('denialToError', () => {
  it('should map each reason to its error class', () => {
    expect(denialToError('unauthenticated')).toBeInstanceOf(UnauthenticatedError);
    expect(denialToError('forbidden')).toBeInstanceOf(ForbiddenError);
    expect(denialToError('not_found')).toBeInstanceOf(NotFoundError);
  });
});
