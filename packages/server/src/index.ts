#!/usr/bin/env node

import { fileURLToPath } from 'node:url';
import { createRuntime, loadConfigOrDefaults } from '@commonroom/core';
import { CommunityServer } from './server.js';

export { CommunityServer } from './server.js';
export type { CommunityServerOptions } from './server.js';

export {
  createActorMiddleware,
  extractSessionToken,
  readCookie,
  actorOf,
  SESSION_COOKIE,
} from './middleware/actor.js';
export {
  AttemptLimiter,
  attemptKey,
  createRateLimitMiddleware,
  parseRateLimitConfig,
  DEFAULT_RATE_LIMIT,
} from './middleware/rate-limit.js';
export type { AttemptOutcome, RateLimitConfig } from './middleware/rate-limit.js';

export { sendError, toHttpError } from './http/errors.js';
export type { ErrorBody, HttpError } from './http/errors.js';

export { createAuthRouter } from './routes/auth.js';
export type { AuthRouteDeps } from './routes/auth.js';
export { createUserRouter, usersQuerySchema } from './routes/users.js';
export type { UserRouteDeps } from './routes/users.js';
export { createTipRouter } from './routes/tips.js';
export { createNewsRouter } from './routes/news.js';
export { createArticleRouter } from './routes/articles.js';
export { createAccessRouter, accessQuerySchema, RESOURCE_TYPES } from './routes/access.js';
export type { AccessRouteDeps, ResourceType } from './routes/access.js';

export { createPageRouter } from './views/routes.js';
export { renderLayout, renderBlogContent } from './views/templates.js';

export { createOpenAPISpec } from './openapi.js';
export type { OpenAPISpec } from './openapi.js';

async function main(): Promise<void> {
  const rootDir = process.argv[2] ?? process.cwd();

  const configResult = await loadConfigOrDefaults(rootDir);
  if (configResult.isErr()) {
    throw configResult.error;
  }
  const config = configResult.value;
  const port = parseInt(process.env['COMMONROOM_PORT'] ?? '', 10) || config.server.port;

  const runtime = createRuntime(config);
  if (runtime.isErr()) {
    throw runtime.error;
  }

  const server = new CommunityServer(runtime.value, { port });
  await server.start();

  // eslint-disable-next-line no-console
  console.log(`[server] ${config.site.name} listening on http://localhost:${port} (${runtime.value.store.kind} store)`);
  // eslint-disable-next-line no-console
  console.log(`[server] OpenAPI spec: http://localhost:${port}/api/openapi.json`);
}

// Only run main when this module is executed directly (not imported)
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  main().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
