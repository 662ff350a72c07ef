/**
 * UserBadgeService Implementation
 *
 * Manual grants and grant queries. One grant per (user, badge).
 */

import { logger as rootLogger, type Logger } from '../lib/logger.js';
import {
  buildEqualityFilters,
  DEFAULT_QUERY_CONFIG,
  failure,
  success,
  type FilterOptionInput,
  type ListOptionsInput,
  type PaginatedResult,
  type QueryConfig,
  type Result,
  type UserBadge,
  type UserBadgeCreate,
} from '../types/index.js';
import { userBadgeCreateSchema, validate } from '../validation/index.js';

import type { BadgeRepository } from './badge.db.js';
import {
  checkIdentifier,
  execute,
  normalizeFilters,
  paginate,
  toFailure,
} from './service.helpers.js';
import type { UserBadgeRepository } from './user-badge.db.js';
import type { UserRepository } from './user.db.js';

export interface UserBadgeService {
  grantBadge(input: UserBadgeCreate): Promise<Result<UserBadge>>;
  getUserBadge(id: string): Promise<Result<UserBadge>>;
  listUserBadges(options: ListOptionsInput): Promise<Result<PaginatedResult<UserBadge>>>;
  getBadgesByUser(
    userId: string,
    options: ListOptionsInput
  ): Promise<Result<PaginatedResult<UserBadge>>>;
  getUsersByBadge(
    badgeId: string,
    options: ListOptionsInput
  ): Promise<Result<PaginatedResult<UserBadge>>>;
  searchUserBadges(options: ListOptionsInput): Promise<Result<PaginatedResult<UserBadge>>>;
  countUserBadges(filters?: FilterOptionInput[]): Promise<Result<number>>;
  revokeBadge(id: string): Promise<Result<void>>;
}

/**
 * Create UserBadgeService instance
 */
export function createUserBadgeService(deps: {
  userBadges: UserBadgeRepository;
  users: Pick<UserRepository, 'exists'>;
  badges: Pick<BadgeRepository, 'exists'>;
  queryConfig?: QueryConfig;
  logger?: Logger;
}): UserBadgeService {
  const { userBadges, users, badges } = deps;
  const queryConfig = deps.queryConfig ?? DEFAULT_QUERY_CONFIG;
  const log = (deps.logger ?? rootLogger).child({ component: 'user-badge-service' });

  return {
    async grantBadge(input: UserBadgeCreate): Promise<Result<UserBadge>> {
      const valid = validate(userBadgeCreateSchema, input);
      if (!valid.success) {
        return valid;
      }

      try {
        if (!(await users.exists(input.userId))) {
          return failure('NOT_FOUND', `User ${input.userId} not found`);
        }
        if (!(await badges.exists(input.badgeId))) {
          return failure('NOT_FOUND', `Badge ${input.badgeId} not found`);
        }

        const held = await userBadges.count(
          buildEqualityFilters({ userId: input.userId, badgeId: input.badgeId })
        );
        if (held > 0) {
          return failure('CONFLICT', 'User already holds this badge', {
            userId: input.userId,
            badgeId: input.badgeId,
          });
        }

        const grant = await userBadges.create(input);
        log.info({ userId: input.userId, badgeId: input.badgeId }, 'Badge granted');
        return success(grant);
      } catch (error) {
        return toFailure(error, log, 'grant badge');
      }
    },

    async getUserBadge(id: string): Promise<Result<UserBadge>> {
      const valid = checkIdentifier(id);
      if (!valid.success) {
        return valid;
      }
      return execute(log, 'get user badge', () => userBadges.findById(id));
    },

    async listUserBadges(
      options: ListOptionsInput
    ): Promise<Result<PaginatedResult<UserBadge>>> {
      return paginate(userBadges, options, queryConfig, log, 'list user badges');
    },

    async getBadgesByUser(
      userId: string,
      options: ListOptionsInput
    ): Promise<Result<PaginatedResult<UserBadge>>> {
      const valid = checkIdentifier(userId);
      if (!valid.success) {
        return valid;
      }
      return paginate(
        userBadges,
        options,
        queryConfig,
        log,
        'list badges of user',
        buildEqualityFilters({ userId })
      );
    },

    async getUsersByBadge(
      badgeId: string,
      options: ListOptionsInput
    ): Promise<Result<PaginatedResult<UserBadge>>> {
      const valid = checkIdentifier(badgeId);
      if (!valid.success) {
        return valid;
      }
      return paginate(
        userBadges,
        options,
        queryConfig,
        log,
        'list holders of badge',
        buildEqualityFilters({ badgeId })
      );
    },

    async searchUserBadges(
      options: ListOptionsInput
    ): Promise<Result<PaginatedResult<UserBadge>>> {
      return paginate(userBadges, options, queryConfig, log, 'search user badges');
    },

    async countUserBadges(filters?: FilterOptionInput[]): Promise<Result<number>> {
      const normalized = normalizeFilters(filters, queryConfig);
      if (!normalized.success) {
        return normalized;
      }
      return execute(log, 'count user badges', () => userBadges.count(normalized.data));
    },

    async revokeBadge(id: string): Promise<Result<void>> {
      const valid = checkIdentifier(id);
      if (!valid.success) {
        return valid;
      }

      const result = await execute(log, 'revoke badge', () => userBadges.delete(id));
      if (result.success) {
        log.info({ userBadgeId: id }, 'Badge revoked');
      }
      return result;
    },
  };
}
