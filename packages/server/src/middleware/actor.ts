import type { Request, Response, NextFunction } from 'express';
import type { Actor, ActorResolver } from '@commonroom/core';
import { sendError } from '../http/errors.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Resolved by the actor middleware; null for anonymous callers. */
      actor?: Actor | null;
      sessionToken?: string | null;
    }
  }
}

export const SESSION_COOKIE = 'commonroom_session';

/**
 * Extract a session token from the request.
 *
 * Accepts, in order:
 * - `Authorization: Bearer <token>` header
 * - `X-Session-Token: <token>` header
 * - the `commonroom_session` cookie (set by the login and confirm endpoints)
 */
export function extractSessionToken(req: Request): string | null {
  const authHeader = req.headers['authorization'];
  if (typeof authHeader === 'string' && authHeader.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    if (token.length > 0) return token;
  }

  const header = req.headers['x-session-token'];
  if (typeof header === 'string' && header.trim().length > 0) {
    return header.trim();
  }

  return readCookie(req.headers['cookie'], SESSION_COOKIE);
}

export function readCookie(header: string | undefined, name: string): string | null {
  if (!header) return null;
  for (const part of header.split(';')) {
    const eq = part.indexOf('=');
    if (eq < 0) continue;
    if (part.slice(0, eq).trim() !== name) continue;
    const value = part.slice(eq + 1).trim();
    if (value.length === 0) return null;
    try {
      return decodeURIComponent(value);
    } catch {
      return value;
    }
  }
  return null;
}

/**
 * Resolve the caller on every request. Never rejects: an unknown or expired
 * token just leaves `req.actor` null, and routes decide what that means.
 */
export function createActorMiddleware(
  actors: Pick<ActorResolver, 'resolve'>,
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = extractSessionToken(req);
    req.sessionToken = token;

    actors
      .resolve(token)
      .then((result) => {
        if (result.isErr()) {
          sendError(res, result.error);
          return;
        }
        req.actor = result.value;
        next();
      })
      .catch((error: unknown) => sendError(res, error));
  };
}

/** The resolved actor, or null. */
export function actorOf(req: Request): Actor | null {
  return req.actor ?? null;
}
