/**
 * Badge Routes
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { BadgeService } from '../../services/index.js';
import { parseListQuery } from '../utils/query.js';
import { getRequestId, readJsonBody } from '../utils/request.js';
import { errorResponse, paginatedResponse, successResponse } from '../utils/response.js';

interface BadgeRoutesDeps {
  badgeService: BadgeService;
}

const badgeCreateBody = z.object({
  name: z.string(),
  description: z.string().optional(),
  iconUrl: z.string().optional(),
});

const badgeUpdateBody = badgeCreateBody.partial();

export function createBadgeRoutes(deps: BadgeRoutesDeps): Hono {
  const { badgeService } = deps;
  const app = new Hono();

  app.get('/badges', async (c) => {
    const requestId = getRequestId(c);
    const query = parseListQuery(c);
    if (!query.success) {
      return errorResponse(c, query.error, requestId);
    }

    const result = await badgeService.listBadges(query.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return paginatedResponse(c, result.data, requestId);
  });

  app.post('/badges', async (c) => {
    const requestId = getRequestId(c);
    const body = await readJsonBody(c, badgeCreateBody);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await badgeService.createBadge(body.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  app.get('/badges/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await badgeService.getBadge(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  app.patch('/badges/:id', async (c) => {
    const requestId = getRequestId(c);
    const body = await readJsonBody(c, badgeUpdateBody);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await badgeService.updateBadge({ ...body.data, id: c.req.param('id') });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  app.delete('/badges/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await badgeService.deleteBadge(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return c.body(null, 204);
  });

  return app;
}
