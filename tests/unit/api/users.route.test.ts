/**
 * User Routes Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect, beforeEach } from 'vitest';

import { createUserRoutes } from '@/api/routes/users.js';

import {
  emptyPage,
  mockAuthMiddleware,
  mockUserService,
  readJson,
  TEST_REQUEST_ID,
  type DataBody,
  type ErrorBody,
  type MockedService,
} from '../../helpers/http.js';
import type { UserService } from '@/services/index.js';

const USER_ID = '11111111-1111-4111-8111-111111111111';

const storedUser = {
  id: USER_ID,
  email: 'ada@example.com',
  phone: '',
  role: 'authenticated',
  lastSignInAt: null,
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: null,
};

describe('User Routes', () => {
  let userService: MockedService<UserService>;
  let app: Hono;

  beforeEach(() => {
    userService = mockUserService();
    app = new Hono();
    app.use('*', mockAuthMiddleware());
    app.route('/api/v1', createUserRoutes({ userService }));
  });

  describe('GET /users', () => {
    it('should pass the parsed list query to the service', async () => {
      userService.listUsers.mockResolvedValue(emptyPage(5));

      const res = await app.request(
        '/api/v1/users?page=2&per_page=5&sort_by=email&sort_order=asc&filter=email:like:ada'
      );

      expect(res.status).toBe(200);
      expect(userService.listUsers).toHaveBeenCalledWith({
        filters: [{ field: 'email', operator: 'like', value: 'ada' }],
        page: 2,
        perPage: 5,
        sortBy: 'email',
        sortOrder: 'asc',
      });
      const body = await readJson<DataBody<unknown[]>>(res);
      expect(body.data).toEqual([]);
      expect(body.meta).toEqual({
        pagination: { total: 0, page: 1, perPage: 5, totalPages: 0, hasNextPage: false },
        requestId: TEST_REQUEST_ID,
      });
    });

    it('should return 400 for a non-numeric page', async () => {
      const res = await app.request('/api/v1/users?page=abc');

      expect(res.status).toBe(400);
      const body = await readJson<ErrorBody>(res);
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.message).toBe('Invalid list query');
      expect(userService.listUsers).not.toHaveBeenCalled();
    });

    it('should map a service validation failure to 400', async () => {
      userService.listUsers.mockResolvedValue({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Cannot filter on unknown field "password"' },
      });

      const res = await app.request('/api/v1/users?filter=password:eq:x');

      expect(res.status).toBe(400);
    });
  });

  describe('POST /users', () => {
    it('should create an account and return 201', async () => {
      userService.createUser.mockResolvedValue({ success: true, data: storedUser });

      const res = await app.request('/api/v1/users', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ email: 'ada@example.com', password: 'Str0ng!pass' }),
      });

      expect(res.status).toBe(201);
      expect(userService.createUser).toHaveBeenCalledWith({
        email: 'ada@example.com',
        password: 'Str0ng!pass',
      });
      const body = await readJson<DataBody<{ email: string; createdAt: string }>>(res);
      expect(body.data.email).toBe('ada@example.com');
      expect(body.data.createdAt).toBe('2024-01-01T00:00:00.000Z');
    });

    it('should return 400 for malformed JSON', async () => {
      const res = await app.request('/api/v1/users', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: 'not json',
      });

      expect(res.status).toBe(400);
      const body = await readJson<ErrorBody>(res);
      expect(body.error.message).toBe('Request body must be valid JSON');
    });

    it('should return 400 when a required field is missing', async () => {
      const res = await app.request('/api/v1/users', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ email: 'ada@example.com' }),
      });

      expect(res.status).toBe(400);
      const body = await readJson<ErrorBody>(res);
      expect(body.error.message).toBe('Required');
      expect(body.error.details).toEqual({ issues: ['password: Required'] });
    });

    it('should return 409 when the email is taken', async () => {
      userService.createUser.mockResolvedValue({
        success: false,
        error: { code: 'CONFLICT', message: 'A user with email ada@example.com already exists' },
      });

      const res = await app.request('/api/v1/users', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ email: 'ada@example.com', password: 'Str0ng!pass' }),
      });

      expect(res.status).toBe(409);
      const body = await readJson<ErrorBody>(res);
      expect(body.error).toEqual({
        code: 'CONFLICT',
        message: 'A user with email ada@example.com already exists',
        requestId: TEST_REQUEST_ID,
      });
    });
  });

  describe('GET /users/:id', () => {
    it('should return the account', async () => {
      userService.getUser.mockResolvedValue({ success: true, data: storedUser });

      const res = await app.request(`/api/v1/users/${USER_ID}`);

      expect(res.status).toBe(200);
      expect(userService.getUser).toHaveBeenCalledWith(USER_ID);
    });

    it('should return 404 when the account does not exist', async () => {
      userService.getUser.mockResolvedValue({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Failed to get user: User not found' },
      });

      const res = await app.request(`/api/v1/users/${USER_ID}`);

      expect(res.status).toBe(404);
    });

    it('should return 502 when the directory fails', async () => {
      userService.getUser.mockResolvedValue({
        success: false,
        error: { code: 'BACKEND_ERROR', message: 'Failed to get user: upstream timeout' },
      });

      const res = await app.request(`/api/v1/users/${USER_ID}`);

      expect(res.status).toBe(502);
    });
  });

  describe('PATCH /users/:id', () => {
    it('should merge the path id into the update', async () => {
      userService.updateUser.mockResolvedValue({ success: true, data: storedUser });

      const res = await app.request(`/api/v1/users/${USER_ID}`, {
        method: 'PATCH',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ phone: '+15550100', id: 'ignored' }),
      });

      expect(res.status).toBe(200);
      expect(userService.updateUser).toHaveBeenCalledWith({ phone: '+15550100', id: USER_ID });
    });

    it('should reject an unknown role', async () => {
      const res = await app.request(`/api/v1/users/${USER_ID}`, {
        method: 'PATCH',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ role: 'root' }),
      });

      expect(res.status).toBe(400);
      expect(userService.updateUser).not.toHaveBeenCalled();
    });
  });

  describe('DELETE /users/:id', () => {
    it('should return 204 with no body', async () => {
      userService.deleteUser.mockResolvedValue({ success: true, data: undefined });

      const res = await app.request(`/api/v1/users/${USER_ID}`, { method: 'DELETE' });

      expect(res.status).toBe(204);
      expect(await res.text()).toBe('');
    });
  });
});
