/**
 * HTTP test helpers: stub auth, typed response bodies and service mocks
 */

import { createMiddleware } from 'hono/factory';
import { vi, type Mock } from 'vitest';

import type {
  BadgeService,
  UserBadgeService,
  UserProfileService,
  UserService,
} from '@/services/index.js';
import type { Pagination } from '@/types/index.js';

export const TEST_REQUEST_ID = 'req-test';
export const TEST_CALLER_ID = '33333333-3333-4333-8333-333333333333';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export interface DataBody<T> {
  data: T;
  meta: {
    pagination?: Pagination;
    requestId: string;
  };
}

export async function readJson<T>(res: Response): Promise<T> {
  return (await res.json()) as T;
}

/**
 * Stands in for token verification
 */
export function mockAuthMiddleware(userId = TEST_CALLER_ID) {
  return createMiddleware(async (c, next) => {
    c.set('requestId', TEST_REQUEST_ID);
    c.set('userId', userId);
    await next();
  });
}

export type MockedService<T> = { [K in keyof T]: Mock };

export function mockUserService(): MockedService<UserService> {
  return {
    createUser: vi.fn(),
    getUser: vi.fn(),
    getUserByEmail: vi.fn(),
    listUsers: vi.fn(),
    searchUsers: vi.fn(),
    updateUser: vi.fn(),
    deleteUser: vi.fn(),
    countUsers: vi.fn(),
  };
}

export function mockUserProfileService(): MockedService<UserProfileService> {
  return {
    createProfile: vi.fn(),
    getProfile: vi.fn(),
    getProfileByUserId: vi.fn(),
    findProfilesByFullname: vi.fn(),
    listProfiles: vi.fn(),
    searchProfiles: vi.fn(),
    countProfiles: vi.fn(),
    updateProfile: vi.fn(),
    deleteProfile: vi.fn(),
    updateAvatar: vi.fn(),
    verifyIdentity: vi.fn(),
  };
}

export function mockBadgeService(): MockedService<BadgeService> {
  return {
    createBadge: vi.fn(),
    getBadge: vi.fn(),
    getBadgeByName: vi.fn(),
    listBadges: vi.fn(),
    searchBadges: vi.fn(),
    updateBadge: vi.fn(),
    deleteBadge: vi.fn(),
    countBadges: vi.fn(),
  };
}

export function mockUserBadgeService(): MockedService<UserBadgeService> {
  return {
    grantBadge: vi.fn(),
    getUserBadge: vi.fn(),
    listUserBadges: vi.fn(),
    getBadgesByUser: vi.fn(),
    getUsersByBadge: vi.fn(),
    searchUserBadges: vi.fn(),
    countUserBadges: vi.fn(),
    revokeBadge: vi.fn(),
  };
}

export function emptyPage(perPage = 10) {
  return {
    success: true,
    data: {
      items: [],
      pagination: { total: 0, page: 1, perPage, totalPages: 0, hasNextPage: false },
    },
  };
}
