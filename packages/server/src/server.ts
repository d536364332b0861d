import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server as HttpServer } from 'node:http';
import type { CommunityRuntime } from '@commonroom/core';
import { createActorMiddleware } from './middleware/actor.js';
import {
  AttemptLimiter,
  createRateLimitMiddleware,
  parseRateLimitConfig,
  type RateLimitConfig,
} from './middleware/rate-limit.js';
import { sendError } from './http/errors.js';
import { createAuthRouter } from './routes/auth.js';
import { createUserRouter } from './routes/users.js';
import { createTipRouter } from './routes/tips.js';
import { createNewsRouter } from './routes/news.js';
import { createArticleRouter } from './routes/articles.js';
import { createAccessRouter } from './routes/access.js';
import { createPageRouter } from './views/routes.js';
import { createOpenAPISpec } from './openapi.js';

export interface CommunityServerOptions {
  /** Port to listen on. Default: `config.server.port` */
  readonly port?: number;
  /** CORS origin. Default: `config.server.corsOrigin` */
  readonly corsOrigin?: string;
  /** Limits for `/api/v1/auth`. If not provided, reads COMMONROOM_RATE_* env vars. */
  readonly rateLimit?: RateLimitConfig;
}

export class CommunityServer {
  private readonly app: Express;
  private readonly port: number;
  private httpServer: HttpServer | null = null;

  constructor(
    private readonly runtime: CommunityRuntime,
    options: CommunityServerOptions = {},
  ) {
    const { config } = runtime;
    this.port = options.port ?? config.server.port;
    const corsOrigin = options.corsOrigin ?? config.server.corsOrigin;
    const rateLimitConfig = options.rateLimit ?? parseRateLimitConfig(process.env);

    this.app = express();

    // --- Global Middleware ---

    this.app.use((req, res, next) => {
      res.setHeader('Access-Control-Allow-Origin', corsOrigin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PATCH, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Session-Token');
      if (req.method === 'OPTIONS') {
        res.status(204).end();
        return;
      }
      next();
    });

    this.app.use(express.json());
    this.app.use(express.urlencoded({ extended: false }));

    // --- Unauthenticated Routes ---

    this.app.get('/health', (_req, res) => {
      res.json({ status: 'ok', store: runtime.store.kind, timestamp: new Date().toISOString() });
    });

    this.app.get('/api/openapi.json', (_req, res) => {
      res.json(createOpenAPISpec());
    });

    // --- Actor-aware Routes ---

    this.app.use(createActorMiddleware(runtime.actors));

    this.app.use('/api/v1/auth', createRateLimitMiddleware(new AttemptLimiter(rateLimitConfig)));
    this.app.use('/api/v1/auth', createAuthRouter({ registration: runtime.registration }));
    this.app.use('/api/v1', createUserRouter({ directory: runtime.directory }));
    this.app.use('/api/v1/tips', createTipRouter({ tips: runtime.tips }));
    this.app.use('/api/v1/news', createNewsRouter({ news: runtime.news }));
    this.app.use('/api/v1', createArticleRouter({ articles: runtime.articles, comments: runtime.comments }));
    this.app.use('/api/v1/access', createAccessRouter({ access: runtime.access, store: runtime.store }));

    this.app.use('/api', (_req, res) => {
      res.status(404).json({ error: 'Not Found', message: 'No such endpoint.' });
    });

    this.app.use(
      createPageRouter({
        siteName: config.site.name,
        blog: runtime.blog,
        registration: runtime.registration,
      }),
    );

    // Body parser failures carry a 4xx status; everything else is unexpected.
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (isClientError(error)) {
        res.status(error.status).json({ error: 'Bad Request', message: 'Malformed request body.' });
        return;
      }
      sendError(res, error);
    });
  }

  /** The Express app, for supertest or for mounting under another server. */
  getApp(): Express {
    return this.app;
  }

  /**
   * Start listening on the configured port.
   */
  async start(): Promise<void> {
    const server = createServer(this.app);
    this.httpServer = server;
    return new Promise<void>((resolvePromise, reject) => {
      server.on('error', reject);
      server.listen(this.port, () => {
        resolvePromise();
      });
    });
  }

  /**
   * Stop accepting connections, then drain queued mail and release the store.
   */
  async close(): Promise<void> {
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolvePromise, reject) => {
        server.close((closeErr) => {
          if (closeErr) reject(closeErr);
          else resolvePromise();
        });
      });
      this.httpServer = null;
    }
    await this.runtime.close();
  }

  getPort(): number {
    return this.port;
  }
}

function isClientError(error: unknown): error is { status: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}
