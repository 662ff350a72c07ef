/**
 * Auth Middleware Unit Tests
 * Bearer token verification and caller recording
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { Hono } from 'hono';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createAuthMiddleware, createRequestIdMiddleware } from '@/api/middleware/auth.js';

import { readJson, type ErrorBody } from '../../helpers/http.js';

const CALLER_ID = '11111111-1111-4111-8111-111111111111';

describe('Auth Middleware', () => {
  let getUser: ReturnType<typeof vi.fn>;
  let app: Hono;

  beforeEach(() => {
    getUser = vi.fn();
    const supabaseClient = { auth: { getUser } } as unknown as Pick<SupabaseClient, 'auth'>;

    app = new Hono();
    app.use('*', createAuthMiddleware({ supabaseClient }));
    app.get('/test', (c) => c.json({ userId: c.get('userId'), requestId: c.get('requestId') }));
  });

  describe('Token Extraction', () => {
    it('should return 401 when Authorization header is missing', async () => {
      const res = await app.request('/test');

      expect(res.status).toBe(401);
      const body = await readJson<ErrorBody>(res);
      expect(body.error.code).toBe('UNAUTHORIZED');
      expect(body.error.message).toBe('Missing or invalid authorization header');
      expect(getUser).not.toHaveBeenCalled();
    });

    it('should return 401 when Authorization header is not Bearer', async () => {
      const res = await app.request('/test', {
        headers: { Authorization: 'Basic dXNlcjpwYXNz' },
      });

      expect(res.status).toBe(401);
    });

    it('should return 401 for an empty bearer token', async () => {
      const res = await app.request('/test', { headers: { Authorization: 'Bearer   ' } });

      expect(res.status).toBe(401);
      expect(getUser).not.toHaveBeenCalled();
    });
  });

  describe('Token Verification', () => {
    it('should return 401 when the token is rejected', async () => {
      getUser.mockResolvedValue({
        data: { user: null },
        error: { message: 'invalid JWT' },
      });

      const res = await app.request('/test', { headers: { Authorization: 'Bearer test-token' } });

      expect(res.status).toBe(401);
      const body = await readJson<ErrorBody>(res);
      expect(body.error.message).toBe('Invalid or expired token');
      expect(getUser).toHaveBeenCalledWith('test-token');
    });

    it('should return 500 when verification throws', async () => {
      getUser.mockRejectedValue(new Error('network down'));

      const res = await app.request('/test', { headers: { Authorization: 'Bearer test-token' } });

      expect(res.status).toBe(500);
      const body = await readJson<ErrorBody>(res);
      expect(body.error).toMatchObject({
        code: 'INTERNAL_ERROR',
        message: 'Authentication failed',
      });
    });

    it('should record the caller and a request id', async () => {
      getUser.mockResolvedValue({ data: { user: { id: CALLER_ID } }, error: null });

      const res = await app.request('/test', { headers: { Authorization: 'Bearer test-token' } });

      expect(res.status).toBe(200);
      const body = await readJson<{ userId: string; requestId: string }>(res);
      expect(body.userId).toBe(CALLER_ID);
      expect(body.requestId).toHaveLength(21);
    });

    it('should keep a request id assigned upstream', async () => {
      getUser.mockResolvedValue({ data: { user: { id: CALLER_ID } }, error: null });
      const outer = new Hono();
      outer.use('*', createRequestIdMiddleware());
      outer.use('*', async (c, next) => {
        c.set('requestId', 'upstream-id');
        await next();
      });
      outer.route('/', app);

      const res = await outer.request('/test', {
        headers: { Authorization: 'Bearer test-token' },
      });

      const body = await readJson<{ requestId: string }>(res);
      expect(body.requestId).toBe('upstream-id');
    });
  });
});
