import type { RoleName } from '../types/account.js';

// ---------------------------------------------------------------------------
// Actions & Decisions
// ---------------------------------------------------------------------------

/** Actions that can be gated by the access evaluator. */
export type Action =
  | 'edit_terms'
  | 'edit_roles'
  | 'create_news'
  | 'edit_news'
  | 'approve_news'
  | 'create_article'
  | 'edit_article'
  | 'create_tip'
  | 'edit_tip'
  | 'create_comment'
  | 'edit_comment';

export const ACTIONS: readonly Action[] = [
  'edit_terms',
  'edit_roles',
  'create_news',
  'edit_news',
  'approve_news',
  'create_article',
  'edit_article',
  'create_tip',
  'edit_tip',
  'create_comment',
  'edit_comment',
] as const;

export function isAction(value: unknown): value is Action {
  return typeof value === 'string' && ACTIONS.some((action) => action === value);
}

export type DenialReason = 'unauthenticated' | 'forbidden' | 'not_found';

export type AccessDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: DenialReason };

/**
 * How an action is gated.
 *
 * - `authenticated`: any signed-in actor.
 * - `ownership`: the resource author, or anyone holding one of `elevated`.
 * - `role`: anyone holding one of `roles`.
 */
export type AccessPolicy =
  | { readonly kind: 'authenticated' }
  | { readonly kind: 'ownership'; readonly elevated: ReadonlySet<RoleName> }
  | { readonly kind: 'role'; readonly roles: ReadonlySet<RoleName> };

/** Booleans handed to templates so they never evaluate access themselves. */
export interface ViewerFlags {
  readonly isOwner: boolean;
  readonly canCreateArticle: boolean;
}
