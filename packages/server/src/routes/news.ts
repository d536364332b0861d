import { Router } from 'express';
import type { NewsService } from '@commonroom/core';
import { sendError } from '../http/errors.js';
import { limitQuerySchema, parseId, parseQuery } from '../http/params.js';
import { respond } from '../http/respond.js';
import { serializeNews } from '../http/serializers.js';
import { actorOf } from '../middleware/actor.js';

export interface NewsRouteDeps {
  readonly news: NewsService;
}

/** Only approved news is listed; drafts awaiting approval are not public. */
export function createNewsRouter(deps: NewsRouteDeps): Router {
  const router = Router();

  router.get('/', async (req, res) => {
    const query = parseQuery(limitQuerySchema, req.query);
    if (query.isErr()) {
      sendError(res, query.error);
      return;
    }
    await respond(res, deps.news.listApprovedNews(query.value.limit), (news) => ({ news: news.map(serializeNews) }));
  });

  router.post('/', async (req, res) => {
    await respond(res, deps.news.createNews(actorOf(req), req.body), (news) => ({ news: serializeNews(news) }), 201);
  });

  router.patch('/:id', async (req, res) => {
    const id = parseId(req.params.id);
    if (id.isErr()) {
      sendError(res, id.error);
      return;
    }
    await respond(res, deps.news.editNews(actorOf(req), id.value, req.body), (news) => ({ news: serializeNews(news) }));
  });

  router.post('/:id/approve', async (req, res) => {
    const id = parseId(req.params.id);
    if (id.isErr()) {
      sendError(res, id.error);
      return;
    }
    await respond(res, deps.news.approveNews(actorOf(req), id.value), (news) => ({ news: serializeNews(news) }));
  });

  return router;
}
