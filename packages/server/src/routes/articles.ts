import { Router } from 'express';
import type { ArticleService, CommentService } from '@commonroom/core';
import { sendError } from '../http/errors.js';
import { parseId } from '../http/params.js';
import { respond } from '../http/respond.js';
import { serializeArticle, serializeComment } from '../http/serializers.js';
import { actorOf } from '../middleware/actor.js';

export interface ArticleRouteDeps {
  readonly articles: ArticleService;
  readonly comments: CommentService;
}

/** `/articles` with nested comments, plus `/comments/:id` for edits. Mounted at the API root. */
export function createArticleRouter(deps: ArticleRouteDeps): Router {
  const router = Router();

  router.get('/articles/:id', async (req, res) => {
    const id = parseId(req.params.id);
    if (id.isErr()) {
      sendError(res, id.error);
      return;
    }
    await respond(res, deps.articles.getVisibleArticle(actorOf(req), id.value), (article) => ({
      article: serializeArticle(article),
    }));
  });

  router.post('/articles', async (req, res) => {
    await respond(
      res,
      deps.articles.createArticle(actorOf(req), req.body),
      (article) => ({ article: serializeArticle(article) }),
      201,
    );
  });

  router.patch('/articles/:id', async (req, res) => {
    const id = parseId(req.params.id);
    if (id.isErr()) {
      sendError(res, id.error);
      return;
    }
    await respond(res, deps.articles.editArticle(actorOf(req), id.value, req.body), (article) => ({
      article: serializeArticle(article),
    }));
  });

  router.get('/articles/:id/comments', async (req, res) => {
    const id = parseId(req.params.id);
    if (id.isErr()) {
      sendError(res, id.error);
      return;
    }
    await respond(res, deps.comments.listComments(actorOf(req), id.value), (comments) => ({
      comments: comments.map(serializeComment),
    }));
  });

  router.post('/articles/:id/comments', async (req, res) => {
    const id = parseId(req.params.id);
    if (id.isErr()) {
      sendError(res, id.error);
      return;
    }
    await respond(
      res,
      deps.comments.createComment(actorOf(req), id.value, req.body),
      (comment) => ({ comment: serializeComment(comment) }),
      201,
    );
  });

  router.patch('/comments/:id', async (req, res) => {
    const id = parseId(req.params.id);
    if (id.isErr()) {
      sendError(res, id.error);
      return;
    }
    await respond(res, deps.comments.editComment(actorOf(req), id.value, req.body), (comment) => ({
      comment: serializeComment(comment),
    }));
  });

  return router;
}
