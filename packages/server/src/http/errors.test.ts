import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ForbiddenError,
  InvalidCredentialsError,
  InvalidTokenError,
  NotFoundError,
  StoreError,
  UnauthenticatedError,
  ValidationError,
} from '@commonroom/core';
import { toHttpError } from './errors.js';

describe('toHttpError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should carry field errors for validation failures', () => {
    expect(toHttpError(new ValidationError({ email: ['Email is required'] }))).toEqual({
      status: 400,
      body: { error: 'Validation Error', message: 'Validation failed', fields: { email: ['Email is required'] } },
    });
  });

  it.each([
    [new UnauthenticatedError(), 401, 'Unauthorized'],
    [new InvalidCredentialsError(), 401, 'Invalid Credentials'],
    [new ForbiddenError(), 403, 'Forbidden'],
    [new InvalidTokenError(), 404, 'Invalid Token'],
    [new NotFoundError(), 404, 'Not Found'],
  ])('should map %s to %i', (error, status, label) => {
    const mapped = toHttpError(error);
    expect(mapped.status).toBe(status);
    expect(mapped.body.error).toBe(label);
  });

  it('should hide store failures behind a generic 503 and log them', () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => {});

    const mapped = toHttpError(new StoreError('password authentication failed for user "app"'));

    expect(mapped).toEqual({
      status: 503,
      body: { error: 'Service Unavailable', message: 'Storage is temporarily unavailable.' },
    });
    expect(log).toHaveBeenCalledWith(
      '[server] Store failure (unavailable): password authentication failed for user "app"',
    );
  });

  it('should answer 500 for anything else', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(toHttpError(new TypeError('boom'))).toEqual({
      status: 500,
      body: { error: 'Internal Server Error', message: 'Something went wrong.' },
    });
  });
});
