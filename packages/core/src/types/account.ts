// ---------------------------------------------------------------------------
// Accounts & Roles
// ---------------------------------------------------------------------------

export type AccountId = number;

export interface Account {
  readonly id: AccountId;
  /** Unique public handle, compared case-insensitively. */
  readonly username: string;
  readonly email: string;
  /** bcrypt hash; the plaintext password is never stored. */
  readonly passwordHash: string;
  readonly isConfirmed: boolean;
  readonly lastLoginAt: Date | null;
  readonly lastActivityAt: Date | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Closed set of role identifiers. Membership is administered outside the app. */
export const ROLE_NAMES = ['administrator', 'moderator', 'librarian'] as const;

export type RoleName = (typeof ROLE_NAMES)[number];

export function isRoleName(value: unknown): value is RoleName {
  return typeof value === 'string' && ROLE_NAMES.some((role) => role === value);
}

/**
 * The authenticated caller of an operation. Passed explicitly into the access
 * evaluator and services instead of being looked up from ambient state.
 */
export interface Actor {
  readonly id: AccountId;
  readonly username: string;
  readonly roles: ReadonlySet<RoleName>;
}

export interface ConfirmationToken {
  readonly code: string;
  readonly accountId: AccountId;
  readonly createdAt: Date;
}

export type PresenceStatus = 'online' | 'offline';
