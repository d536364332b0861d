// ---------------------------------------------------------------------------
// Request-level errors (recoverable, shown to the user)
// ---------------------------------------------------------------------------

export type FieldErrors = Readonly<Record<string, readonly string[]>>;

export class ValidationError extends Error {
  readonly fields: FieldErrors;

  constructor(fields: FieldErrors, message = 'Validation failed') {
    super(message);
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

export class UnauthenticatedError extends Error {
  constructor(message = 'Authentication required') {
    super(message);
    this.name = 'UnauthenticatedError';
  }
}

export class ForbiddenError extends Error {
  constructor(message = 'Access denied') {
    super(message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends Error {
  constructor(message = 'Not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Unknown or already consumed confirmation code. Deliberately uninformative. */
export class InvalidTokenError extends Error {
  constructor(message = 'Invalid confirmation code') {
    super(message);
    this.name = 'InvalidTokenError';
  }
}

/** Wrong e-mail or password. Never says which one. */
export class InvalidCredentialsError extends Error {
  constructor(message = 'Wrong email or password.') {
    super(message);
    this.name = 'InvalidCredentialsError';
  }
}

// ---------------------------------------------------------------------------
// Infrastructure errors (logged, surfaced generically)
// ---------------------------------------------------------------------------

export type StoreErrorKind = 'unavailable' | 'conflict';

export class StoreError extends Error {
  readonly kind: StoreErrorKind;
  /** For `conflict`: the unique field that collided, when known. */
  readonly field: string | undefined;

  constructor(message: string, kind: StoreErrorKind = 'unavailable', field?: string) {
    super(message);
    this.name = 'StoreError';
    this.kind = kind;
    this.field = field;
  }
}

export class MailError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MailError';
  }
}

export type ConfigErrorReason = 'not_found' | 'invalid';

export class ConfigError extends Error {
  readonly reason: ConfigErrorReason;

  constructor(message: string, reason: ConfigErrorReason = 'invalid') {
    super(message);
    this.name = 'ConfigError';
    this.reason = reason;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
