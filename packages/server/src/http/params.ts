import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import { ValidationError, toFieldErrors } from '@commonroom/core';

const idSchema = z.coerce.number().int('must be an integer').positive('must be positive');

/** Parse a numeric route parameter such as `:id`. */
export function parseId(raw: unknown, name = 'id'): Result<number, ValidationError> {
  const parsed = idSchema.safeParse(raw);
  if (!parsed.success) {
    return err(new ValidationError({ [name]: parsed.error.issues.map((issue) => `${name} ${issue.message}`) }));
  }
  return ok(parsed.data);
}

/** Parse a query object with a zod schema, reporting issues per field. */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): Result<z.output<S>, ValidationError> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    return err(new ValidationError(toFieldErrors(parsed.error)));
  }
  return ok(parsed.data);
}

export const limitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1, 'limit must be at least 1').max(100, 'limit must be at most 100').optional(),
});
