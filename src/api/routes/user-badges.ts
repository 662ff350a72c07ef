/**
 * User Badge Routes
 * Manual grants, revocations and grant listings
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { UserBadgeService } from '../../services/index.js';
import { parseListQuery } from '../utils/query.js';
import { getRequestId, readJsonBody } from '../utils/request.js';
import { errorResponse, paginatedResponse, successResponse } from '../utils/response.js';

interface UserBadgeRoutesDeps {
  userBadgeService: UserBadgeService;
}

const grantBody = z.object({
  userId: z.string(),
  badgeId: z.string(),
});

export function createUserBadgeRoutes(deps: UserBadgeRoutesDeps): Hono {
  const { userBadgeService } = deps;
  const app = new Hono();

  app.get('/user-badges', async (c) => {
    const requestId = getRequestId(c);
    const query = parseListQuery(c);
    if (!query.success) {
      return errorResponse(c, query.error, requestId);
    }

    const result = await userBadgeService.listUserBadges(query.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return paginatedResponse(c, result.data, requestId);
  });

  /**
   * POST /user-badges
   * Grant a badge; a second grant of the same badge is a conflict
   */
  app.post('/user-badges', async (c) => {
    const requestId = getRequestId(c);
    const body = await readJsonBody(c, grantBody);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await userBadgeService.grantBadge(body.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  app.get('/user-badges/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await userBadgeService.getUserBadge(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  app.delete('/user-badges/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await userBadgeService.revokeBadge(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return c.body(null, 204);
  });

  app.get('/users/:id/badges', async (c) => {
    const requestId = getRequestId(c);
    const query = parseListQuery(c);
    if (!query.success) {
      return errorResponse(c, query.error, requestId);
    }

    const result = await userBadgeService.getBadgesByUser(c.req.param('id'), query.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return paginatedResponse(c, result.data, requestId);
  });

  app.get('/badges/:id/holders', async (c) => {
    const requestId = getRequestId(c);
    const query = parseListQuery(c);
    if (!query.success) {
      return errorResponse(c, query.error, requestId);
    }

    const result = await userBadgeService.getUsersByBadge(c.req.param('id'), query.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return paginatedResponse(c, result.data, requestId);
  });

  return app;
}
