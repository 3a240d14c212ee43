/**
 * HTTP binding for the identity provider
 *
 * Every route translates the request into a dispatcher command; this layer
 * holds no authentication logic of its own. Sets up:
 * - POST /oauth/token (password and refresh_token grants)
 * - Token refresh, introspection and userinfo endpoints
 * - User registration and administration
 * - GET /.well-known/jwks.json and /.well-known/openid-configuration
 * - Error handler with WWW-Authenticate headers on 401
 */

import express, {
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import { createServer, type Server } from 'node:http';
import { z } from 'zod';
import type { CoreContext } from '../bootstrap.js';
import {
  IdentityErrors,
  createErrorResponse,
  isIdentityError,
  sanitizeError,
} from '../utils/errors.js';
import {
  SUPPORTED_GRANT_TYPES,
  generateDiscoveryDocument,
  generateWWWAuthenticateHeader,
} from './discovery.js';

/**
 * HTTP Server Options
 */
export interface IdentityServerOptions {
  /** Public base URL, e.g. "https://id.example.com" */
  issuer: string;
  /** Allowed CORS origins; "*" allows any (default: none) */
  corsOrigins?: readonly string[];
}

// ============================================================================
// Request Schemas
// ============================================================================

const GrantTypeSchema = z.object({ grant_type: z.string().min(1) });

const TokenRequestSchema = z.discriminatedUnion('grant_type', [
  z.object({
    grant_type: z.literal('password'),
    username: z.string().min(1),
    password: z.string().min(1),
    scope: z.string().optional(),
  }),
  z.object({
    grant_type: z.literal('refresh_token'),
    refresh_token: z.string().min(1),
  }),
]);

const RefreshRequestSchema = z.object({ refresh_token: z.string().min(1) });

const IntrospectRequestSchema = z.object({ token: z.string().min(1) });

// No roles: self-registration always gets the default role
const RegisterRequestSchema = z.object({
  username: z.string(),
  email: z.string(),
  password: z.string(),
});

const RoleRequestSchema = z.object({ role: z.string().min(1) });

const BodyParserErrorSchema = z.object({ type: z.literal('entity.parse.failed') });

const TOKEN_ERROR_CODES = new Set(['TOKEN_INVALID', 'TOKEN_EXPIRED', 'TOKEN_VERIFICATION_ERROR']);

// ============================================================================
// Helpers
// ============================================================================

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw IdentityErrors.VALIDATION_FAILED(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}

function bearerToken(req: Request): string {
  const match = /^Bearer\s+(\S+)$/i.exec(req.headers.authorization ?? '');
  if (!match) {
    throw IdentityErrors.TOKEN_INVALID({ reason: 'missing bearer token' });
  }
  return match[1];
}

function parseScope(scope: string | undefined): string[] | undefined {
  const scopes = scope?.split(' ').filter((s) => s.length > 0);
  return scopes && scopes.length > 0 ? scopes : undefined;
}

/**
 * Forward rejections from async route handlers to the error middleware
 */
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

// ============================================================================
// Server
// ============================================================================

/**
 * Create the Express application
 *
 * @param context - Service graph from createCoreContext()
 * @param options - Server options
 */
export function createIdentityServer(
  context: Pick<CoreContext, 'dispatcher' | 'keyManager' | 'codec'>,
  options: IdentityServerOptions
): express.Application {
  const { dispatcher, keyManager, codec } = context;
  const corsOrigins = options.corsOrigins ?? [];
  const realm = options.issuer.replace(/\/+$/, '');

  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // CORS headers
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (corsOrigins.includes('*')) {
      res.header('Access-Control-Allow-Origin', '*');
    } else if (origin && corsOrigins.includes(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.header('Access-Control-Expose-Headers', 'WWW-Authenticate');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  // --------------------------------------------------------------------------
  // OAuth endpoints
  // --------------------------------------------------------------------------

  app.post(
    '/oauth/token',
    route(async (req, res) => {
      const { grant_type } = parseBody(GrantTypeSchema, req.body);
      if (!SUPPORTED_GRANT_TYPES.some((supported) => supported === grant_type)) {
        res.status(400).json({
          error: 'unsupported_grant_type',
          error_description: `Unsupported grant_type: ${grant_type}`,
        });
        return;
      }

      const body = parseBody(TokenRequestSchema, req.body);
      const scopes = body.grant_type === 'password' ? parseScope(body.scope) : undefined;
      const supportedScopes = codec.getDefaultScopes();
      const unsupported = (scopes ?? []).filter((scope) => !supportedScopes.includes(scope));
      if (unsupported.length > 0) {
        res.status(400).json({
          error: 'invalid_scope',
          error_description: `Unsupported scope: ${unsupported.join(' ')}`,
        });
        return;
      }

      const response =
        body.grant_type === 'password'
          ? await dispatcher.dispatch({
              kind: 'login',
              username: body.username,
              password: body.password,
              scopes,
            })
          : await dispatcher.dispatch({ kind: 'refresh', refreshToken: body.refresh_token });

      res.setHeader('Cache-Control', 'no-store');
      res.json(response);
    })
  );

  app.post(
    '/oauth/refresh',
    route(async (req, res) => {
      const { refresh_token } = parseBody(RefreshRequestSchema, req.body);
      res.setHeader('Cache-Control', 'no-store');
      res.json(await dispatcher.dispatch({ kind: 'refresh', refreshToken: refresh_token }));
    })
  );

  app.post(
    '/oauth/introspect',
    route(async (req, res) => {
      const { token } = parseBody(IntrospectRequestSchema, req.body);
      res.json(await dispatcher.dispatch({ kind: 'introspect', token }));
    })
  );

  app.get(
    '/oauth/userinfo',
    route(async (req, res) => {
      res.json(await dispatcher.dispatch({ kind: 'userinfo', accessToken: bearerToken(req) }));
    })
  );

  // --------------------------------------------------------------------------
  // Users
  // --------------------------------------------------------------------------

  app.post(
    '/users/register',
    route(async (req, res) => {
      const { username, email, password } = parseBody(RegisterRequestSchema, req.body);
      res
        .status(201)
        .json(await dispatcher.dispatch({ kind: 'register', username, email, password }));
    })
  );

  app.get(
    '/users/me',
    route(async (req, res) => {
      res.json(await dispatcher.dispatch({ kind: 'userinfo', accessToken: bearerToken(req) }));
    })
  );

  app.get(
    '/users',
    route(async (req, res) => {
      res.json(
        await dispatcher.dispatch({ kind: 'list-principals', accessToken: bearerToken(req) })
      );
    })
  );

  for (const [action, active] of [
    ['activate', true],
    ['deactivate', false],
  ] as const) {
    app.post(
      `/users/:id/${action}`,
      route(async (req, res) => {
        res.json(
          await dispatcher.dispatch({
            kind: 'set-active',
            accessToken: bearerToken(req),
            principalId: req.params.id,
            active,
          })
        );
      })
    );
  }

  app.post(
    '/users/:id/roles',
    route(async (req, res) => {
      const { role } = parseBody(RoleRequestSchema, req.body);
      res.json(
        await dispatcher.dispatch({
          kind: 'grant-role',
          accessToken: bearerToken(req),
          principalId: req.params.id,
          role,
        })
      );
    })
  );

  app.delete(
    '/users/:id/roles/:role',
    route(async (req, res) => {
      res.json(
        await dispatcher.dispatch({
          kind: 'revoke-role',
          accessToken: bearerToken(req),
          principalId: req.params.id,
          role: req.params.role,
        })
      );
    })
  );

  // --------------------------------------------------------------------------
  // Discovery
  // --------------------------------------------------------------------------

  app.get(
    '/.well-known/jwks.json',
    route(async (req, res) => {
      res.setHeader('Cache-Control', 'public, max-age=300');
      res.json(await keyManager.jwks());
    })
  );

  app.get('/.well-known/openid-configuration', (req: Request, res: Response) => {
    res.json(generateDiscoveryDocument(options.issuer, codec.getDefaultScopes()));
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'identity-provider',
      timestamp: new Date().toISOString(),
    });
  });

  // --------------------------------------------------------------------------
  // Error handler
  // --------------------------------------------------------------------------

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const error = BodyParserErrorSchema.safeParse(err).success
      ? IdentityErrors.VALIDATION_FAILED(['Malformed request body'])
      : err;

    const { statusCode, body } = createErrorResponse(error);

    if (statusCode === 401) {
      const tokenError = isIdentityError(error) && TOKEN_ERROR_CODES.has(error.code);
      res.setHeader(
        'WWW-Authenticate',
        generateWWWAuthenticateHeader(realm, tokenError ? 'invalid_token' : undefined)
      );
    }
    if (statusCode >= 500) {
      console.error('[HTTP Server] Error:', sanitizeError(error));
    }

    res.status(statusCode).json(body);
  });

  return app;
}

/**
 * Start listening
 *
 * @returns HTTP server instance once it is accepting connections
 */
export function startHTTPServer(app: express.Application, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, () => {
      console.log(`[HTTP Server] Listening on port ${port}`);
      console.log(`[HTTP Server] Token endpoint: http://localhost:${port}/oauth/token`);
      console.log(`[HTTP Server] JWKS: http://localhost:${port}/.well-known/jwks.json`);
      resolve(server);
    });
  });
}
