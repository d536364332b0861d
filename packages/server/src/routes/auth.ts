import { Router, type Response } from 'express';
import type { RegistrationWorkflow, OpenedSession } from '@commonroom/core';
import { sendError } from '../http/errors.js';
import { serializeAccount, serializeSession } from '../http/serializers.js';
import { SESSION_COOKIE } from '../middleware/actor.js';

export interface AuthRouteDeps {
  readonly registration: Pick<RegistrationWorkflow, 'register' | 'confirm' | 'login' | 'logout'>;
}

/** Persistent sessions get a dated cookie; the rest end with the browser. */
export function setSessionCookie(res: Response, session: OpenedSession): void {
  res.cookie(SESSION_COOKIE, session.token, {
    httpOnly: true,
    sameSite: 'lax',
    path: '/',
    ...(session.persistent ? { expires: session.expiresAt } : {}),
  });
}

export function createAuthRouter(deps: AuthRouteDeps): Router {
  const router = Router();

  router.post('/register', async (req, res) => {
    try {
      const result = await deps.registration.register(req.body);
      if (result.isErr()) {
        sendError(res, result.error);
        return;
      }
      res.status(201).json({ account: result.value });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.post('/confirm/:code', async (req, res) => {
    try {
      const result = await deps.registration.confirm(req.params.code);
      if (result.isErr()) {
        sendError(res, result.error);
        return;
      }
      setSessionCookie(res, result.value.session);
      res.json({
        account: serializeAccount(result.value.account),
        session: serializeSession(result.value.session),
      });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.post('/login', async (req, res) => {
    try {
      const result = await deps.registration.login(req.body);
      if (result.isErr()) {
        sendError(res, result.error);
        return;
      }
      setSessionCookie(res, result.value.session);
      res.json({
        account: serializeAccount(result.value.account),
        session: serializeSession(result.value.session),
      });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.post('/logout', async (req, res) => {
    try {
      const result = await deps.registration.logout(req.sessionToken);
      if (result.isErr()) {
        sendError(res, result.error);
        return;
      }
      res.clearCookie(SESSION_COOKIE, { path: '/' });
      res.status(204).end();
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  return router;
}
