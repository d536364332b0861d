import { Router } from 'express';
import type { TipService } from '@commonroom/core';
import { sendError } from '../http/errors.js';
import { limitQuerySchema, parseId, parseQuery } from '../http/params.js';
import { respond } from '../http/respond.js';
import { serializeTip } from '../http/serializers.js';
import { actorOf } from '../middleware/actor.js';

export interface TipRouteDeps {
  readonly tips: TipService;
}

export function createTipRouter(deps: TipRouteDeps): Router {
  const router = Router();

  router.get('/', async (req, res) => {
    const query = parseQuery(limitQuerySchema, req.query);
    if (query.isErr()) {
      sendError(res, query.error);
      return;
    }
    await respond(res, deps.tips.latestTips(query.value.limit), (tips) => ({ tips: tips.map(serializeTip) }));
  });

  router.post('/', async (req, res) => {
    await respond(res, deps.tips.createTip(actorOf(req), req.body), (tip) => ({ tip: serializeTip(tip) }), 201);
  });

  router.patch('/:id', async (req, res) => {
    const id = parseId(req.params.id);
    if (id.isErr()) {
      sendError(res, id.error);
      return;
    }
    await respond(res, deps.tips.editTip(actorOf(req), id.value, req.body), (tip) => ({ tip: serializeTip(tip) }));
  });

  return router;
}
