/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { Hono, type MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';
import { logger as accessLogger } from 'hono/logger';

import { logger as rootLogger, SERVICE_NAME, type Logger } from '../lib/logger.js';

import {
  createAuthMiddleware,
  createRequestIdMiddleware,
} from './middleware/auth.js';
import { createBadgeRoutes } from './routes/badges.js';
import { createHealthRoutes } from './routes/health.js';
import { createProfileRoutes } from './routes/profiles.js';
import { createUserBadgeRoutes } from './routes/user-badges.js';
import { createUserRoutes } from './routes/users.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  supabaseClient: Pick<SupabaseClient, 'auth'>;
  services: ApiServices;
  allowedOrigins?: string[];
  logger?: Logger;
  /** Replaces token verification; tests pass a stub */
  authMiddleware?: MiddlewareHandler;
}

const API_VERSION = 'v1';

const PROTECTED_PREFIXES = ['users', 'profiles', 'badges', 'user-badges'];

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { supabaseClient, services, allowedOrigins } = config;
  const log = (config.logger ?? rootLogger).child({ component: 'http' });
  const app = new Hono();

  // Global middleware
  app.use('*', createRequestIdMiddleware());
  app.use(
    '*',
    accessLogger((message, ...rest) => {
      log.info(rest.length > 0 ? { detail: rest } : {}, message);
    })
  );
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.route('/api/v1', createHealthRoutes({ service: SERVICE_NAME, version: API_VERSION }));

  // Protected routes
  const authMiddleware =
    config.authMiddleware ?? createAuthMiddleware({ supabaseClient, logger: config.logger });
  for (const prefix of PROTECTED_PREFIXES) {
    app.use(`/api/v1/${prefix}`, authMiddleware);
    app.use(`/api/v1/${prefix}/*`, authMiddleware);
  }

  app.route('/api/v1', createUserRoutes({ userService: services.userService }));
  app.route(
    '/api/v1',
    createProfileRoutes({ userProfileService: services.userProfileService })
  );
  app.route('/api/v1', createBadgeRoutes({ badgeService: services.badgeService }));
  app.route(
    '/api/v1',
    createUserBadgeRoutes({ userBadgeService: services.userBadgeService })
  );

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId') ?? 'unknown';
    log.error({ err, requestId }, 'Unhandled error');

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
