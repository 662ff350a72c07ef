/**
 * BadgeService Implementation
 *
 * Badge names are unique; they are how achievement rules refer to badges.
 */

import { logger as rootLogger, type Logger } from '../lib/logger.js';
import {
  DEFAULT_QUERY_CONFIG,
  failure,
  success,
  type Badge,
  type BadgeCreate,
  type BadgeUpdate,
  type FilterOptionInput,
  type ListOptionsInput,
  type PaginatedResult,
  type QueryConfig,
  type Result,
} from '../types/index.js';
import {
  badgeCreateSchema,
  badgeUpdateSchema,
  nameLookupSchema,
  validate,
} from '../validation/index.js';

import type { BadgeRepository } from './badge.db.js';
import { mergeNonZero } from './merge.js';
import {
  checkIdentifier,
  execute,
  normalizeFilters,
  paginate,
  toFailure,
} from './service.helpers.js';

export interface BadgeService {
  createBadge(input: BadgeCreate): Promise<Result<Badge>>;
  getBadge(id: string): Promise<Result<Badge>>;
  getBadgeByName(name: string): Promise<Result<Badge>>;
  listBadges(options: ListOptionsInput): Promise<Result<PaginatedResult<Badge>>>;
  searchBadges(
    term: string,
    options: ListOptionsInput
  ): Promise<Result<PaginatedResult<Badge>>>;
  updateBadge(input: BadgeUpdate): Promise<Result<Badge>>;
  deleteBadge(id: string): Promise<Result<void>>;
  countBadges(filters?: FilterOptionInput[]): Promise<Result<number>>;
}

/**
 * Create BadgeService instance
 */
export function createBadgeService(deps: {
  badges: BadgeRepository;
  queryConfig?: QueryConfig;
  logger?: Logger;
}): BadgeService {
  const { badges } = deps;
  const queryConfig = deps.queryConfig ?? DEFAULT_QUERY_CONFIG;
  const log = (deps.logger ?? rootLogger).child({ component: 'badge-service' });

  async function findByName(name: string): Promise<Badge | undefined> {
    const matches = await badges.findByField('name', name);
    return matches[0];
  }

  return {
    async createBadge(input: BadgeCreate): Promise<Result<Badge>> {
      const valid = validate(badgeCreateSchema, input);
      if (!valid.success) {
        return valid;
      }

      try {
        if ((await findByName(input.name)) !== undefined) {
          return failure('CONFLICT', `Badge "${input.name}" already exists`);
        }
        const badge = await badges.create(input);
        log.info({ badgeId: badge.id, name: badge.name }, 'Badge created');
        return success(badge);
      } catch (error) {
        return toFailure(error, log, 'create badge');
      }
    },

    async getBadge(id: string): Promise<Result<Badge>> {
      const valid = checkIdentifier(id);
      if (!valid.success) {
        return valid;
      }
      return execute(log, 'get badge', () => badges.findById(id));
    },

    async getBadgeByName(name: string): Promise<Result<Badge>> {
      const valid = validate(nameLookupSchema, { name });
      if (!valid.success) {
        return valid;
      }

      try {
        const badge = await findByName(name);
        if (badge === undefined) {
          return failure('NOT_FOUND', `Badge "${name}" not found`);
        }
        return success(badge);
      } catch (error) {
        return toFailure(error, log, 'get badge by name');
      }
    },

    async listBadges(options: ListOptionsInput): Promise<Result<PaginatedResult<Badge>>> {
      return paginate(badges, options, queryConfig, log, 'list badges');
    },

    async searchBadges(
      term: string,
      options: ListOptionsInput
    ): Promise<Result<PaginatedResult<Badge>>> {
      return paginate(badges, { ...options, search: term }, queryConfig, log, 'search badges');
    },

    async updateBadge(input: BadgeUpdate): Promise<Result<Badge>> {
      const valid = validate(badgeUpdateSchema, input);
      if (!valid.success) {
        return valid;
      }

      try {
        const existing = await badges.findById(input.id);
        const merged = mergeNonZero(
          { name: existing.name, description: existing.description, iconUrl: existing.iconUrl },
          { name: input.name, description: input.description, iconUrl: input.iconUrl }
        );

        if (merged.name !== existing.name) {
          const holder = await findByName(merged.name);
          if (holder !== undefined && holder.id !== existing.id) {
            return failure('CONFLICT', `Badge "${merged.name}" already exists`);
          }
        }

        const badge = await badges.update({ id: existing.id, ...merged });
        log.info({ badgeId: badge.id }, 'Badge updated');
        return success(badge);
      } catch (error) {
        return toFailure(error, log, 'update badge');
      }
    },

    async deleteBadge(id: string): Promise<Result<void>> {
      const valid = checkIdentifier(id);
      if (!valid.success) {
        return valid;
      }
      return execute(log, 'delete badge', () => badges.delete(id));
    },

    async countBadges(filters?: FilterOptionInput[]): Promise<Result<number>> {
      const normalized = normalizeFilters(filters, queryConfig);
      if (!normalized.success) {
        return normalized;
      }
      return execute(log, 'count badges', () => badges.count(normalized.data));
    },
  };
}
