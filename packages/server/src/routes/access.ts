import { Router } from 'express';
import { z } from 'zod';
import {
  isAction,
  ValidationError,
  type AccessEvaluator,
  type CommunityStore,
  type OwnedResource,
  type StoreResult,
} from '@commonroom/core';
import { sendError } from '../http/errors.js';
import { parseQuery } from '../http/params.js';
import { actorOf } from '../middleware/actor.js';

export const RESOURCE_TYPES = ['news', 'article', 'tip', 'comment'] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export const accessQuerySchema = z
  .object({
    resourceType: z.enum(RESOURCE_TYPES).optional(),
    resourceId: z.coerce.number().int().positive().optional(),
  })
  .refine((q) => (q.resourceType === undefined) === (q.resourceId === undefined), {
    message: 'resourceType and resourceId must be given together',
    path: ['resourceId'],
  });

export interface AccessRouteDeps {
  readonly access: AccessEvaluator;
  readonly store: Pick<CommunityStore, 'news' | 'articles' | 'tips' | 'comments'>;
}

function findResource(
  store: AccessRouteDeps['store'],
  type: ResourceType,
  id: number,
): StoreResult<OwnedResource | null> {
  switch (type) {
    case 'news':
      return store.news.findById(id);
    case 'article':
      return store.articles.findById(id);
    case 'tip':
      return store.tips.findById(id);
    case 'comment':
      return store.comments.findById(id);
  }
}

/**
 * Access check endpoint: lets a client ask whether the current caller could
 * perform an action, so it can hide controls it would be refused.
 */
export function createAccessRouter(deps: AccessRouteDeps): Router {
  const router = Router();

  router.get('/:action', async (req, res) => {
    const action = req.params.action;
    if (!isAction(action)) {
      sendError(res, new ValidationError({ action: [`Unknown action "${action}"`] }));
      return;
    }
    const query = parseQuery(accessQuerySchema, req.query);
    if (query.isErr()) {
      sendError(res, query.error);
      return;
    }

    try {
      let resource: OwnedResource | null = null;
      const { resourceType, resourceId } = query.value;
      if (resourceType !== undefined && resourceId !== undefined) {
        const found = await findResource(deps.store, resourceType, resourceId);
        if (found.isErr()) {
          sendError(res, found.error);
          return;
        }
        resource = found.value;
      }

      const decision = deps.access.canPerform(actorOf(req), action, resource);
      res.json(decision.allowed ? { action, allowed: true } : { action, allowed: false, reason: decision.reason });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  return router;
}
