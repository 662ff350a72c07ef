/**
 * Profile Routes
 * Profiles, profile images and identity verification
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { UserProfileService } from '../../services/index.js';
import { parseListQuery } from '../utils/query.js';
import { getRequestId, readImageUpload, readJsonBody } from '../utils/request.js';
import { errorResponse, paginatedResponse, successResponse } from '../utils/response.js';

interface ProfileRoutesDeps {
  userProfileService: UserProfileService;
}

// Zod Schemas
const profileCreateBody = z.object({
  userId: z.string(),
  fullname: z.string(),
  bio: z.string().optional(),
  avatarUrl: z.string().optional(),
});

const profileUpdateBody = z.object({
  fullname: z.string().optional(),
  bio: z.string().optional(),
});

/**
 * Create profile routes
 */
export function createProfileRoutes(deps: ProfileRoutesDeps): Hono {
  const { userProfileService } = deps;
  const app = new Hono();

  app.get('/profiles', async (c) => {
    const requestId = getRequestId(c);
    const query = parseListQuery(c);
    if (!query.success) {
      return errorResponse(c, query.error, requestId);
    }

    const result = await userProfileService.listProfiles(query.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return paginatedResponse(c, result.data, requestId);
  });

  /**
   * GET /profiles/search?q=
   * Free-text search over fullname and bio
   */
  app.get('/profiles/search', async (c) => {
    const requestId = getRequestId(c);
    const query = parseListQuery(c);
    if (!query.success) {
      return errorResponse(c, query.error, requestId);
    }

    const term = c.req.query('q') ?? query.data.search ?? '';
    const result = await userProfileService.searchProfiles(term, query.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return paginatedResponse(c, result.data, requestId);
  });

  /**
   * POST /profiles
   * Create the profile of a user; grants the explorer badge
   */
  app.post('/profiles', async (c) => {
    const requestId = getRequestId(c);
    const body = await readJsonBody(c, profileCreateBody);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await userProfileService.createProfile(body.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  app.get('/profiles/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await userProfileService.getProfile(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  app.get('/users/:id/profile', async (c) => {
    const requestId = getRequestId(c);
    const result = await userProfileService.getProfileByUserId(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  app.patch('/profiles/:id', async (c) => {
    const requestId = getRequestId(c);
    const body = await readJsonBody(c, profileUpdateBody);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await userProfileService.updateProfile({
      ...body.data,
      id: c.req.param('id'),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  app.delete('/profiles/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await userProfileService.deleteProfile(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return c.body(null, 204);
  });

  /**
   * PUT /profiles/:id/avatar
   * Multipart upload, field "file"
   */
  app.put('/profiles/:id/avatar', async (c) => {
    const requestId = getRequestId(c);
    const upload = await readImageUpload(c);
    if (!upload.success) {
      return errorResponse(c, upload.error, requestId);
    }

    const result = await userProfileService.updateAvatar(c.req.param('id'), upload.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * PUT /profiles/:id/identity
   * Multipart upload, field "file"; grants the verified-locale badge
   */
  app.put('/profiles/:id/identity', async (c) => {
    const requestId = getRequestId(c);
    const upload = await readImageUpload(c);
    if (!upload.success) {
      return errorResponse(c, upload.error, requestId);
    }

    const result = await userProfileService.verifyIdentity(c.req.param('id'), upload.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  return app;
}
