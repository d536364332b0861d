import { Router, type Request, type Response } from 'express';
import { InvalidTokenError, type BlogService, type RegistrationWorkflow } from '@commonroom/core';
import { toHttpError } from '../http/errors.js';
import { actorOf } from '../middleware/actor.js';
import { setSessionCookie } from '../routes/auth.js';
import {
  renderBlogContent,
  renderConfirmedContent,
  renderInvalidConfirmationContent,
  renderLayout,
  renderPreconfirmationContent,
} from './templates.js';

export interface PageRouteDeps {
  readonly siteName: string;
  readonly blog: BlogService;
  readonly registration: Pick<RegistrationWorkflow, 'confirm'>;
}

/** Browser-facing pages. Mounted at the site root. */
export function createPageRouter(deps: PageRouteDeps): Router {
  const router = Router();

  const page = (req: Request, res: Response, title: string, content: string, status = 200): void => {
    const viewer = actorOf(req)?.username ?? null;
    res.status(status);
    res.setHeader('Content-Type', 'text/html; charset=utf-8');
    res.send(renderLayout({ siteName: deps.siteName, title, viewer }, content));
  };

  const errorPage = (req: Request, res: Response, error: unknown): void => {
    const { status, body } = toHttpError(error);
    page(req, res, body.error, `<h1>${status} ${body.error}</h1>`, status);
  };

  router.get('/blog/:username', async (req, res) => {
    try {
      const view = await deps.blog.buildBlog(actorOf(req), req.params.username);
      if (view.isErr()) {
        errorPage(req, res, view.error);
        return;
      }
      page(req, res, `${view.value.owner.username}'s blog`, renderBlogContent(view.value));
    } catch (error: unknown) {
      errorPage(req, res, error);
    }
  });

  // The link from the registration e-mail lands here.
  router.get('/auth/confirm/:code', async (req, res) => {
    try {
      const result = await deps.registration.confirm(req.params.code);
      if (result.isErr()) {
        if (result.error instanceof InvalidTokenError) {
          page(req, res, 'Confirmation failed', renderInvalidConfirmationContent(), 404);
          return;
        }
        errorPage(req, res, result.error);
        return;
      }
      setSessionCookie(res, result.value.session);
      page(req, res, 'Account confirmed', renderConfirmedContent(result.value.account));
    } catch (error: unknown) {
      errorPage(req, res, error);
    }
  });

  router.get('/auth/preconfirmation', (req, res) => {
    page(req, res, 'Check your inbox', renderPreconfirmationContent());
  });

  return router;
}
