import { ok, err, type Result } from 'neverthrow';
import type { z } from 'zod';
import type { Actor } from '../types/account.js';
import type { OwnedResource } from '../types/content.js';
import type { Action } from '../auth/types.js';
import { denialToError, type AccessError, type AccessEvaluator } from '../auth/rbac.js';
import { NotFoundError, UnauthenticatedError, ValidationError, type StoreError } from '../types/errors.js';
import { toFieldErrors } from '../registration/schemas.js';

export type ContentError = AccessError | ValidationError | StoreError;

export type ContentResult<T> = Promise<Result<T, ContentError>>;

/**
 * Runs the access check and narrows the actor. `resource` is only consulted
 * for ownership-gated actions.
 */
export function authorize(
  access: AccessEvaluator,
  actor: Actor | null,
  action: Action,
  resource?: OwnedResource | null,
): Result<Actor, AccessError> {
  if (!actor) return err(new UnauthenticatedError());
  const decision = access.canPerform(actor, action, resource);
  return decision.allowed ? ok(actor) : err(denialToError(decision.reason));
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>, ValidationError> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return err(new ValidationError(toFieldErrors(parsed.error)));
  }
  return ok(parsed.data);
}

/** Null from a repository becomes NotFoundError. */
export function found<T>(result: Result<T | null, StoreError>, what: string): Result<T, StoreError | NotFoundError> {
  if (result.isErr()) return err(result.error);
  return result.value === null ? err(new NotFoundError(`${what} not found`)) : ok(result.value);
}
