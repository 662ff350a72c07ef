/**
 * User Routes
 * Account management over the identity directory
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { UserService } from '../../services/index.js';
import { parseListQuery } from '../utils/query.js';
import { getRequestId, readJsonBody } from '../utils/request.js';
import { errorResponse, paginatedResponse, successResponse } from '../utils/response.js';

interface UserRoutesDeps {
  userService: UserService;
}

const roleSchema = z.enum(['authenticated', 'admin', 'moderator']);

// Zod Schemas
const userCreateBody = z.object({
  email: z.string(),
  password: z.string(),
  phone: z.string().optional(),
  role: roleSchema.optional(),
});

const userUpdateBody = z.object({
  email: z.string().optional(),
  password: z.string().optional(),
  phone: z.string().optional(),
  role: roleSchema.optional(),
});

/**
 * Create user routes
 */
export function createUserRoutes(deps: UserRoutesDeps): Hono {
  const { userService } = deps;
  const app = new Hono();

  /**
   * GET /users
   * List accounts
   */
  app.get('/users', async (c) => {
    const requestId = getRequestId(c);
    const query = parseListQuery(c);
    if (!query.success) {
      return errorResponse(c, query.error, requestId);
    }

    const result = await userService.listUsers(query.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return paginatedResponse(c, result.data, requestId);
  });

  /**
   * POST /users
   * Register an account
   */
  app.post('/users', async (c) => {
    const requestId = getRequestId(c);
    const body = await readJsonBody(c, userCreateBody);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await userService.createUser(body.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  app.get('/users/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await userService.getUser(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * PATCH /users/:id
   * Empty fields keep their stored value
   */
  app.patch('/users/:id', async (c) => {
    const requestId = getRequestId(c);
    const body = await readJsonBody(c, userUpdateBody);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await userService.updateUser({ ...body.data, id: c.req.param('id') });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  app.delete('/users/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await userService.deleteUser(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return c.body(null, 204);
  });

  return app;
}
