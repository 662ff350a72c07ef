/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createHealthRoutes } from '@/api/routes/health.js';

import { mockAuthMiddleware, readJson, TEST_REQUEST_ID } from '../../helpers/http.js';

interface HealthBody {
  status: string;
  service: string;
  version: string;
  timestamp: string;
  uptimeSeconds: number;
  requestId?: string;
}

function clock(...instants: string[]): () => Date {
  let index = 0;
  return () => new Date(instants[Math.min(index++, instants.length - 1)] ?? 0);
}

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should report service, version and uptime', async () => {
      const app = new Hono();
      app.route(
        '/api/v1',
        createHealthRoutes({
          service: 'profile-badges-api',
          version: 'v1',
          now: clock('2024-05-01T12:00:00.000Z', '2024-05-01T12:01:30.500Z'),
        })
      );

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      const body = await readJson<HealthBody>(res);
      expect(body).toEqual({
        status: 'ok',
        service: 'profile-badges-api',
        version: 'v1',
        timestamp: '2024-05-01T12:01:30.500Z',
        uptimeSeconds: 90,
      });
    });

    it('should echo the request id', async () => {
      const app = new Hono();
      app.use('*', mockAuthMiddleware());
      app.route('/api/v1', createHealthRoutes({ service: 'profile-badges-api', version: 'v1' }));

      const res = await app.request('/api/v1/health');

      const body = await readJson<HealthBody>(res);
      expect(body.requestId).toBe(TEST_REQUEST_ID);
    });
  });
});
