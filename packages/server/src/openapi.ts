import { ACTIONS, COMMONROOM_VERSION } from '@commonroom/core';

/**
 * OpenAPI 3.0 specification for the Commonroom JSON API.
 */
export interface OpenAPISpec {
  readonly openapi: string;
  readonly info: {
    readonly title: string;
    readonly version: string;
    readonly description: string;
  };
  readonly paths: Record<string, unknown>;
  readonly components: Record<string, unknown>;
}

const SESSION = [{ bearerAuth: [] }, { sessionHeader: [] }];

function ref(name: string): { $ref: string } {
  return { $ref: `#/components/schemas/${name}` };
}

function jsonBody(schema: unknown) {
  return { required: true, content: { 'application/json': { schema } } };
}

function jsonResponse(description: string, schema: unknown) {
  return { description, content: { 'application/json': { schema } } };
}

function wrapped(key: string, schema: unknown) {
  return { type: 'object', properties: { [key]: schema } };
}

const errorResponses = {
  '400': { $ref: '#/components/responses/ValidationError' },
  '401': { $ref: '#/components/responses/Unauthorized' },
  '403': { $ref: '#/components/responses/Forbidden' },
  '404': { $ref: '#/components/responses/NotFound' },
};

function idParam(name = 'id') {
  return { name, in: 'path', required: true, schema: { type: 'integer', minimum: 1 } };
}

const limitParam = { name: 'limit', in: 'query', schema: { type: 'integer', minimum: 1, maximum: 100 } };

export function createOpenAPISpec(): OpenAPISpec {
  const signedIn = jsonResponse('Signed in', {
    type: 'object',
    properties: { account: ref('Account'), session: ref('Session') },
  });

  return {
    openapi: '3.0.3',
    info: {
      title: 'Commonroom API',
      version: COMMONROOM_VERSION,
      description:
        'Accounts, registration with e-mail confirmation, presence and community content ' +
        '(news, articles, tips, comments).',
    },
    paths: {
      '/api/v1/auth/register': {
        post: {
          summary: 'Register an account',
          description: 'Creates an unconfirmed account and e-mails a single-use confirmation link.',
          tags: ['Auth'],
          requestBody: jsonBody(ref('RegistrationRequest')),
          responses: {
            '201': jsonResponse('Pending confirmation', wrapped('account', ref('PendingAccount'))),
            '400': errorResponses['400'],
            '429': { $ref: '#/components/responses/TooManyRequests' },
          },
        },
      },
      '/api/v1/auth/confirm/{code}': {
        post: {
          summary: 'Consume a confirmation code',
          tags: ['Auth'],
          parameters: [{ name: 'code', in: 'path', required: true, schema: { type: 'string' } }],
          responses: {
            '200': signedIn,
            '404': jsonResponse('Unknown or already used code', ref('Error')),
          },
        },
      },
      '/api/v1/auth/login': {
        post: {
          summary: 'Sign in',
          tags: ['Auth'],
          requestBody: jsonBody(ref('LoginRequest')),
          responses: {
            '200': signedIn,
            '400': errorResponses['400'],
            '401': jsonResponse('Wrong email or password', ref('Error')),
            '429': { $ref: '#/components/responses/TooManyRequests' },
          },
        },
      },
      '/api/v1/auth/logout': {
        post: {
          summary: 'Sign out',
          tags: ['Auth'],
          security: SESSION,
          responses: { '204': { description: 'Session closed (idempotent)' } },
        },
      },
      '/api/v1/me': {
        get: {
          summary: 'Current actor and profile',
          tags: ['Users'],
          security: SESSION,
          responses: {
            '200': jsonResponse('Signed in', {
              type: 'object',
              properties: { actor: ref('Actor'), profile: ref('Profile') },
            }),
            '401': errorResponses['401'],
          },
        },
      },
      '/api/v1/users': {
        get: {
          summary: 'List or search accounts',
          description: 'With `q`, searches usernames. Otherwise lists by presence (online by default).',
          tags: ['Users'],
          parameters: [
            { name: 'status', in: 'query', schema: { type: 'string', enum: ['online', 'offline'] } },
            { name: 'q', in: 'query', schema: { type: 'string', maxLength: 100 } },
            limitParam,
          ],
          responses: {
            '200': jsonResponse('Accounts', wrapped('users', { type: 'array', items: ref('Account') })),
            '400': errorResponses['400'],
          },
        },
      },
      '/api/v1/users/{username}': {
        get: {
          summary: 'Public profile',
          tags: ['Users'],
          parameters: [{ name: 'username', in: 'path', required: true, schema: { type: 'string' } }],
          responses: {
            '200': jsonResponse('Profile', wrapped('user', ref('Profile'))),
            '404': errorResponses['404'],
          },
        },
      },
      '/api/v1/tips': {
        get: {
          summary: 'Latest tips',
          tags: ['Tips'],
          parameters: [limitParam],
          responses: { '200': jsonResponse('Tips', wrapped('tips', { type: 'array', items: ref('Tip') })) },
        },
        post: {
          summary: 'Create a tip',
          tags: ['Tips'],
          security: SESSION,
          requestBody: jsonBody(ref('BodyRequest')),
          responses: { '201': jsonResponse('Created', wrapped('tip', ref('Tip'))), ...errorResponses },
        },
      },
      '/api/v1/tips/{id}': {
        patch: {
          summary: 'Edit a tip (author, administrator or librarian)',
          tags: ['Tips'],
          security: SESSION,
          parameters: [idParam()],
          requestBody: jsonBody(ref('BodyRequest')),
          responses: { '200': jsonResponse('Updated', wrapped('tip', ref('Tip'))), ...errorResponses },
        },
      },
      '/api/v1/news': {
        get: {
          summary: 'Approved news',
          tags: ['News'],
          parameters: [limitParam],
          responses: { '200': jsonResponse('News', wrapped('news', { type: 'array', items: ref('News') })) },
        },
        post: {
          summary: 'Submit news for approval',
          tags: ['News'],
          security: SESSION,
          requestBody: jsonBody(ref('NewsRequest')),
          responses: { '201': jsonResponse('Created', wrapped('news', ref('News'))), ...errorResponses },
        },
      },
      '/api/v1/news/{id}': {
        patch: {
          summary: 'Edit news (author only)',
          tags: ['News'],
          security: SESSION,
          parameters: [idParam()],
          requestBody: jsonBody(ref('NewsRequest')),
          responses: { '200': jsonResponse('Updated', wrapped('news', ref('News'))), ...errorResponses },
        },
      },
      '/api/v1/news/{id}/approve': {
        post: {
          summary: 'Approve news (administrator or moderator)',
          tags: ['News'],
          security: SESSION,
          parameters: [idParam()],
          responses: { '200': jsonResponse('Approved', wrapped('news', ref('News'))), ...errorResponses },
        },
      },
      '/api/v1/articles': {
        post: {
          summary: 'Write an article',
          tags: ['Articles'],
          security: SESSION,
          requestBody: jsonBody(ref('ArticleRequest')),
          responses: { '201': jsonResponse('Created', wrapped('article', ref('Article'))), ...errorResponses },
        },
      },
      '/api/v1/articles/{id}': {
        get: {
          summary: 'Read an article (drafts only for their author)',
          tags: ['Articles'],
          parameters: [idParam()],
          responses: { '200': jsonResponse('Article', wrapped('article', ref('Article'))), '404': errorResponses['404'] },
        },
        patch: {
          summary: 'Edit an article (author or administrator)',
          tags: ['Articles'],
          security: SESSION,
          parameters: [idParam()],
          requestBody: jsonBody(ref('ArticleRequest')),
          responses: { '200': jsonResponse('Updated', wrapped('article', ref('Article'))), ...errorResponses },
        },
      },
      '/api/v1/articles/{id}/comments': {
        get: {
          summary: 'Comments on an article',
          tags: ['Comments'],
          parameters: [idParam()],
          responses: {
            '200': jsonResponse('Comments', wrapped('comments', { type: 'array', items: ref('Comment') })),
            '404': errorResponses['404'],
          },
        },
        post: {
          summary: 'Comment on an article',
          tags: ['Comments'],
          security: SESSION,
          parameters: [idParam()],
          requestBody: jsonBody(ref('BodyRequest')),
          responses: { '201': jsonResponse('Created', wrapped('comment', ref('Comment'))), ...errorResponses },
        },
      },
      '/api/v1/comments/{id}': {
        patch: {
          summary: 'Edit a comment (author, administrator or moderator)',
          tags: ['Comments'],
          security: SESSION,
          parameters: [idParam()],
          requestBody: jsonBody(ref('BodyRequest')),
          responses: { '200': jsonResponse('Updated', wrapped('comment', ref('Comment'))), ...errorResponses },
        },
      },
      '/api/v1/access/{action}': {
        get: {
          summary: 'Ask whether the caller may perform an action',
          tags: ['Access'],
          parameters: [
            { name: 'action', in: 'path', required: true, schema: { type: 'string', enum: [...ACTIONS] } },
            { name: 'resourceType', in: 'query', schema: { type: 'string', enum: ['news', 'article', 'tip', 'comment'] } },
            { name: 'resourceId', in: 'query', schema: { type: 'integer', minimum: 1 } },
          ],
          responses: {
            '200': jsonResponse('Decision', ref('AccessDecision')),
            '400': errorResponses['400'],
          },
        },
      },
    },
    components: {
      securitySchemes: {
        bearerAuth: { type: 'http', scheme: 'bearer' },
        sessionHeader: { type: 'apiKey', in: 'header', name: 'X-Session-Token' },
      },
      responses: {
        ValidationError: jsonResponse('Invalid input', ref('Error')),
        Unauthorized: jsonResponse('Not signed in', ref('Error')),
        Forbidden: jsonResponse('Not allowed', ref('Error')),
        NotFound: jsonResponse('No such resource', ref('Error')),
        TooManyRequests: jsonResponse('Too many attempts', ref('Error')),
      },
      schemas: {
        Error: {
          type: 'object',
          required: ['error'],
          properties: {
            error: { type: 'string' },
            message: { type: 'string' },
            fields: { type: 'object', additionalProperties: { type: 'array', items: { type: 'string' } } },
          },
        },
        RegistrationRequest: {
          type: 'object',
          required: ['username', 'email', 'password'],
          properties: {
            username: { type: 'string', minLength: 2, maxLength: 32 },
            email: { type: 'string', format: 'email' },
            password: { type: 'string' },
          },
        },
        LoginRequest: {
          type: 'object',
          required: ['email', 'password'],
          properties: {
            email: { type: 'string' },
            password: { type: 'string' },
            remember: { type: 'boolean', default: true },
          },
        },
        PendingAccount: {
          type: 'object',
          properties: { id: { type: 'integer' }, username: { type: 'string' }, email: { type: 'string' } },
        },
        Account: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            username: { type: 'string' },
            isConfirmed: { type: 'boolean' },
            lastLoginAt: { type: 'string', format: 'date-time', nullable: true },
            lastActivityAt: { type: 'string', format: 'date-time', nullable: true },
            createdAt: { type: 'string', format: 'date-time' },
          },
        },
        Profile: {
          allOf: [
            ref('Account'),
            {
              type: 'object',
              properties: {
                roles: { type: 'array', items: { type: 'string' } },
                online: { type: 'boolean' },
              },
            },
          ],
        },
        Actor: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            username: { type: 'string' },
            roles: { type: 'array', items: { type: 'string' } },
          },
        },
        Session: {
          type: 'object',
          properties: {
            token: { type: 'string' },
            expiresAt: { type: 'string', format: 'date-time' },
            persistent: { type: 'boolean' },
          },
        },
        BodyRequest: { type: 'object', required: ['body'], properties: { body: { type: 'string' } } },
        NewsRequest: {
          type: 'object',
          properties: { title: { type: 'string', maxLength: 200 }, body: { type: 'string' } },
        },
        ArticleRequest: {
          type: 'object',
          properties: {
            title: { type: 'string', maxLength: 200 },
            body: { type: 'string' },
            publish: { type: 'boolean' },
          },
        },
        News: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            authorId: { type: 'integer' },
            title: { type: 'string' },
            body: { type: 'string' },
            isApproved: { type: 'boolean' },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        Article: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            authorId: { type: 'integer' },
            title: { type: 'string' },
            body: { type: 'string' },
            publishedAt: { type: 'string', format: 'date-time', nullable: true },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        Tip: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            authorId: { type: 'integer' },
            body: { type: 'string' },
            publishedAt: { type: 'string', format: 'date-time' },
            createdAt: { type: 'string', format: 'date-time' },
          },
        },
        Comment: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            articleId: { type: 'integer' },
            authorId: { type: 'integer' },
            body: { type: 'string' },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        AccessDecision: {
          type: 'object',
          required: ['action', 'allowed'],
          properties: {
            action: { type: 'string' },
            allowed: { type: 'boolean' },
            reason: { type: 'string', enum: ['unauthenticated', 'forbidden', 'not_found'] },
          },
        },
      },
    },
  };
}
