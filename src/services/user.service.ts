/**
 * UserService Implementation
 *
 * SCOPE: Accounts in the identity directory
 * NOT IN SCOPE: Profiles, badges
 *
 * GUARDRAILS:
 * - Result pattern required (no thrown errors)
 * - Email addresses are unique
 * - Updates only override non-empty fields
 */

import { logger as rootLogger, type Logger } from '../lib/logger.js';
import {
  DEFAULT_QUERY_CONFIG,
  failure,
  success,
  type FilterOptionInput,
  type ListOptionsInput,
  type PaginatedResult,
  type QueryConfig,
  type Result,
  type User,
  type UserCreate,
  type UserUpdate,
} from '../types/index.js';
import {
  emailLookupSchema,
  userCreateSchema,
  userUpdateSchema,
  validate,
} from '../validation/index.js';

import { mergeNonZero } from './merge.js';
import {
  checkIdentifier,
  execute,
  normalizeFilters,
  paginate,
  toFailure,
} from './service.helpers.js';
import type { UserRepository } from './user.db.js';

/**
 * UserService interface
 */
export interface UserService {
  createUser(input: UserCreate): Promise<Result<User>>;
  getUser(id: string): Promise<Result<User>>;
  getUserByEmail(email: string): Promise<Result<User>>;
  listUsers(options: ListOptionsInput): Promise<Result<PaginatedResult<User>>>;
  searchUsers(
    term: string,
    options: ListOptionsInput
  ): Promise<Result<PaginatedResult<User>>>;
  updateUser(input: UserUpdate): Promise<Result<User>>;
  deleteUser(id: string): Promise<Result<void>>;
  countUsers(filters?: FilterOptionInput[]): Promise<Result<number>>;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create UserService instance
 */
export function createUserService(deps: {
  users: UserRepository;
  queryConfig?: QueryConfig;
  logger?: Logger;
}): UserService {
  const { users } = deps;
  const queryConfig = deps.queryConfig ?? DEFAULT_QUERY_CONFIG;
  const log = (deps.logger ?? rootLogger).child({ component: 'user-service' });

  async function findByEmail(email: string): Promise<User | undefined> {
    const matches = await users.findByField('email', email);
    return matches[0];
  }

  return {
    async createUser(input: UserCreate): Promise<Result<User>> {
      const valid = validate(userCreateSchema, input);
      if (!valid.success) {
        return valid;
      }

      try {
        if ((await findByEmail(input.email)) !== undefined) {
          return failure('CONFLICT', `A user with email ${input.email} already exists`);
        }

        const user = await users.create(input);
        log.info({ userId: user.id }, 'User created');
        return success(user);
      } catch (error) {
        return toFailure(error, log, 'create user');
      }
    },

    async getUser(id: string): Promise<Result<User>> {
      const valid = checkIdentifier(id);
      if (!valid.success) {
        return valid;
      }
      return execute(log, 'get user', () => users.findById(id));
    },

    async getUserByEmail(email: string): Promise<Result<User>> {
      const valid = validate(emailLookupSchema, { email });
      if (!valid.success) {
        return valid;
      }

      try {
        const user = await findByEmail(email);
        if (user === undefined) {
          return failure('NOT_FOUND', `No user with email ${email}`);
        }
        return success(user);
      } catch (error) {
        return toFailure(error, log, 'get user by email');
      }
    },

    async listUsers(options: ListOptionsInput): Promise<Result<PaginatedResult<User>>> {
      return paginate(users, options, queryConfig, log, 'list users');
    },

    async searchUsers(
      term: string,
      options: ListOptionsInput
    ): Promise<Result<PaginatedResult<User>>> {
      return paginate(users, { ...options, search: term }, queryConfig, log, 'search users');
    },

    async updateUser(input: UserUpdate): Promise<Result<User>> {
      const valid = validate(userUpdateSchema, input);
      if (!valid.success) {
        return valid;
      }

      try {
        const existing = await users.findById(input.id);
        const merged = mergeNonZero(
          { email: existing.email, phone: existing.phone, role: existing.role },
          { email: input.email, phone: input.phone, role: input.role }
        );

        if (merged.email !== existing.email) {
          const holder = await findByEmail(merged.email);
          if (holder !== undefined && holder.id !== input.id) {
            return failure('CONFLICT', `A user with email ${merged.email} already exists`);
          }
        }

        const update: UserUpdate = { id: input.id };
        if (merged.email !== existing.email) update.email = merged.email;
        if (merged.phone !== existing.phone) update.phone = merged.phone;
        if (input.role !== undefined && merged.role !== existing.role) update.role = input.role;
        if (input.password !== undefined && input.password !== '') {
          update.password = input.password;
        }

        const user = await users.update(update);
        log.info({ userId: user.id }, 'User updated');
        return success(user);
      } catch (error) {
        return toFailure(error, log, 'update user');
      }
    },

    async deleteUser(id: string): Promise<Result<void>> {
      const valid = checkIdentifier(id);
      if (!valid.success) {
        return valid;
      }

      const result = await execute(log, 'delete user', () => users.delete(id));
      if (result.success) {
        log.info({ userId: id }, 'User deleted');
      }
      return result;
    },

    async countUsers(filters?: FilterOptionInput[]): Promise<Result<number>> {
      const normalized = normalizeFilters(filters, queryConfig);
      if (!normalized.success) {
        return normalized;
      }
      return execute(log, 'count users', () => users.count(normalized.data));
    },
  };
}
