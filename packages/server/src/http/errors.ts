import type { Response } from 'express';
import {
  ValidationError,
  UnauthenticatedError,
  ForbiddenError,
  NotFoundError,
  InvalidTokenError,
  InvalidCredentialsError,
  StoreError,
  errorMessage,
  type FieldErrors,
} from '@commonroom/core';

export interface ErrorBody {
  readonly error: string;
  readonly message?: string;
  readonly fields?: FieldErrors;
}

export interface HttpError {
  readonly status: number;
  readonly body: ErrorBody;
}

/** Map a domain error to a status and JSON envelope. Unknown errors are logged. */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: 'Validation Error', message: error.message, fields: error.fields } };
  }
  if (error instanceof UnauthenticatedError) {
    return { status: 401, body: { error: 'Unauthorized', message: error.message } };
  }
  if (error instanceof InvalidCredentialsError) {
    return { status: 401, body: { error: 'Invalid Credentials', message: error.message } };
  }
  if (error instanceof ForbiddenError) {
    return { status: 403, body: { error: 'Forbidden', message: error.message } };
  }
  if (error instanceof InvalidTokenError) {
    return { status: 404, body: { error: 'Invalid Token', message: error.message } };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: 'Not Found', message: error.message } };
  }
  if (error instanceof StoreError) {
    // eslint-disable-next-line no-console
    console.error(`[server] Store failure (${error.kind}): ${error.message}`);
    return { status: 503, body: { error: 'Service Unavailable', message: 'Storage is temporarily unavailable.' } };
  }

  // eslint-disable-next-line no-console
  console.error(`[server] Unhandled error: ${errorMessage(error)}`);
  return { status: 500, body: { error: 'Internal Server Error', message: 'Something went wrong.' } };
}

export function sendError(res: Response, error: unknown): void {
  const { status, body } = toHttpError(error);
  res.status(status).json(body);
}
