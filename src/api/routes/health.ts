/**
 * Health Route
 * Public liveness probe; no backend is contacted
 */

import { Hono } from 'hono';

interface HealthRoutesDeps {
  service: string;
  version: string;
  /** Injected for tests */
  now?: () => Date;
}

export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const app = new Hono();

  app.get('/health', (c) => {
    const current = now();
    return c.json({
      status: 'ok',
      service: deps.service,
      version: deps.version,
      timestamp: current.toISOString(),
      uptimeSeconds: Math.floor((current.getTime() - startedAt.getTime()) / 1000),
      requestId: c.get('requestId'),
    });
  });

  return app;
}
