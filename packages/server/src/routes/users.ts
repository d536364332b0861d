import { Router } from 'express';
import { z } from 'zod';
import { UnauthenticatedError, type AccountDirectory } from '@commonroom/core';
import { sendError } from '../http/errors.js';
import { parseQuery } from '../http/params.js';
import { serializeAccount, serializeActor, serializeProfile } from '../http/serializers.js';
import { actorOf } from '../middleware/actor.js';

export const usersQuerySchema = z.object({
  status: z.enum(['online', 'offline']).optional(),
  q: z.string().max(100, 'q must be at most 100 characters').optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export interface UserRouteDeps {
  readonly directory: AccountDirectory;
}

/** `/me` and `/users`. Mounted at the API root. */
export function createUserRouter(deps: UserRouteDeps): Router {
  const router = Router();

  router.get('/me', async (req, res) => {
    const actor = actorOf(req);
    if (!actor) {
      sendError(res, new UnauthenticatedError());
      return;
    }
    try {
      const profile = await deps.directory.findProfileById(actor.id);
      if (profile.isErr()) {
        sendError(res, profile.error);
        return;
      }
      res.json({ actor: serializeActor(actor), profile: serializeProfile(profile.value) });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  // Search takes precedence over status; with neither, online users are listed.
  router.get('/users', async (req, res) => {
    const query = parseQuery(usersQuerySchema, req.query);
    if (query.isErr()) {
      sendError(res, query.error);
      return;
    }
    const { status, q, limit } = query.value;

    try {
      const result =
        q !== undefined
          ? await deps.directory.searchAccounts(q, limit)
          : status === 'offline'
            ? await deps.directory.listOffline(limit)
            : await deps.directory.listOnline(limit);
      if (result.isErr()) {
        sendError(res, result.error);
        return;
      }
      res.json({ users: result.value.map(serializeAccount) });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  router.get('/users/:username', async (req, res) => {
    try {
      const profile = await deps.directory.findProfile(req.params.username);
      if (profile.isErr()) {
        sendError(res, profile.error);
        return;
      }
      res.json({ user: serializeProfile(profile.value) });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  return router;
}
