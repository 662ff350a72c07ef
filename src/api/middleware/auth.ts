/**
 * Auth Middleware
 * Verifies the caller's Supabase access token and records who is calling
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import { logger as rootLogger, type Logger } from '../../lib/logger.js';

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  supabaseClient: Pick<SupabaseClient, 'auth'>;
  logger?: Logger;
}

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return nanoid();
}

function unauthorized(c: Context, message: string, requestId: string): Response {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Create auth middleware for protected routes
 * Extracts the bearer token and verifies it with Supabase Auth
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { supabaseClient } = deps;
  const log = (deps.logger ?? rootLogger).child({ component: 'auth-middleware' });

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = c.get('requestId') ?? generateRequestId();
    c.set('requestId', requestId);

    const authHeader = c.req.header('Authorization');
    if (authHeader === undefined || !authHeader.startsWith('Bearer ')) {
      return unauthorized(c, 'Missing or invalid authorization header', requestId);
    }

    const token = authHeader.slice(7).trim();
    if (token === '') {
      return unauthorized(c, 'Missing or invalid authorization header', requestId);
    }

    let userId: string;
    try {
      const {
        data: { user },
        error,
      } = await supabaseClient.auth.getUser(token);

      if (error !== null || user === null) {
        return unauthorized(c, 'Invalid or expired token', requestId);
      }
      userId = user.id;
    } catch (err) {
      log.error({ err, requestId }, 'Auth middleware error');
      return c.json(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'Authentication failed',
            requestId,
          },
        },
        500
      );
    }

    c.set('userId', userId);
    await next();
  };
}

/**
 * Create middleware that only assigns a request ID
 */
export function createRequestIdMiddleware() {
  return async function requestIdMiddleware(c: Context, next: Next) {
    c.set('requestId', generateRequestId());
    await next();
  };
}
