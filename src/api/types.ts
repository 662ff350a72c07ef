/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ErrorCode, Pagination } from '../types/index.js';

import type {
  BadgeService,
  UserBadgeService,
  UserProfileService,
  UserService,
} from '../services/index.js';

/**
 * Extended Hono context with the caller
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    userId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    pagination?: Pagination;
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 404 | 409 | 500 | 502;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Readonly<Record<ErrorCode, ErrorStatus>> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  CONFLICT: 409,
  BACKEND_ERROR: 502,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}

/**
 * Services the routes depend on
 */
export interface ApiServices {
  userService: UserService;
  userProfileService: UserProfileService;
  badgeService: BadgeService;
  userBadgeService: UserBadgeService;
}
