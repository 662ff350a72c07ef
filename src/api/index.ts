/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export type { ApiServices, ErrorResponse, SuccessResponse } from './types.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
export { createAuthMiddleware, createRequestIdMiddleware } from './middleware/auth.js';
export { parseFilterExpression, parseListQuery } from './utils/query.js';
