/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ServiceError } from './result.js';
export { success, failure, failureFrom, mapResult } from './result.js';
export type { ErrorCode, RepositoryErrorKind } from './errors.js';
export { ERROR_CODES, RepositoryError, isRepositoryError } from './errors.js';
export type {
  FilterOperator,
  SortOrder,
  FilterScalar,
  FilterValue,
  FilterOption,
  FilterOptionInput,
  ListOptions,
  ListOptionsInput,
  QueryConfig,
} from './query.js';
export {
  FILTER_OPERATORS,
  SORT_ORDERS,
  DEFAULT_QUERY_CONFIG,
  isFilterOperator,
  isSortOrder,
  validateListOptions,
  normalizeListOptions,
  buildEqualityFilters,
} from './query.js';
export type {
  Pagination,
  PaginatedResult,
  SearchResult,
} from './pagination.js';
export {
  buildPagination,
  toPaginatedResult,
  paginateResults,
} from './pagination.js';
export type { User, UserRole, UserCreate, UserUpdate } from './user.js';
export type {
  UserProfile,
  UserProfileCreate,
  UserProfileUpdate,
  UserProfileRecord,
  ImageUpload,
} from './profile.js';
export type {
  Badge,
  BadgeCreate,
  BadgeUpdate,
  UserBadge,
  UserBadgeCreate,
  UserBadgeUpdate,
} from './badge.js';
export type {
  AchievementEvent,
  AchievementEventType,
  AchievementRuleTable,
  GrantState,
} from './achievement.js';
