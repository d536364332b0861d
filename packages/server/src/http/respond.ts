import type { Response } from 'express';
import type { Result } from 'neverthrow';
import { sendError } from './errors.js';

/**
 * Await a service call and answer with `status` and `render(value)`, or the
 * mapped error. Thrown errors take the same path as returned ones.
 */
export async function respond<T, E>(
  res: Response,
  pending: Promise<Result<T, E>>,
  render: (value: T) => unknown,
  status = 200,
): Promise<void> {
  try {
    const result = await pending;
    if (result.isErr()) {
      sendError(res, result.error);
      return;
    }
    res.status(status).json(render(result.value));
  } catch (error: unknown) {
    sendError(res, error);
  }
}
