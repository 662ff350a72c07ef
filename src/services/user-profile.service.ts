/**
 * UserProfileService Implementation
 *
 * SCOPE: Profiles, avatar and identity images, achievement triggers
 *
 * GUARDRAILS:
 * - One profile per user; the user must exist
 * - Result pattern required (no thrown errors)
 * - A badge that is already held is not an error for the triggering workflow
 */

import { extname } from 'node:path';

import { logger as rootLogger, type Logger } from '../lib/logger.js';
import {
  buildEqualityFilters,
  DEFAULT_QUERY_CONFIG,
  failure,
  success,
  type AchievementEventType,
  type Badge,
  type FilterOptionInput,
  type ImageUpload,
  type ListOptionsInput,
  type PaginatedResult,
  type QueryConfig,
  type Result,
  type UserProfile,
  type UserProfileCreate,
  type UserProfileRecord,
  type UserProfileUpdate,
} from '../types/index.js';
import { profileCreateSchema, profileUpdateSchema, validate } from '../validation/index.js';

import type { AchievementService } from './achievement.service.js';
import type { BlobStorage } from './file.storage.js';
import { mergeNonZero } from './merge.js';
import type { ProfileRepository } from './profile.db.js';
import {
  checkIdentifier,
  execute,
  normalizeFilters,
  paginate,
  toFailure,
} from './service.helpers.js';
import type { UserRepository } from './user.db.js';

export interface UserProfileService {
  createProfile(input: UserProfileCreate): Promise<Result<UserProfile>>;
  getProfile(id: string): Promise<Result<UserProfile>>;
  getProfileByUserId(userId: string): Promise<Result<UserProfile>>;
  findProfilesByFullname(
    fullname: string,
    options: ListOptionsInput
  ): Promise<Result<PaginatedResult<UserProfile>>>;
  listProfiles(options: ListOptionsInput): Promise<Result<PaginatedResult<UserProfile>>>;
  searchProfiles(
    term: string,
    options: ListOptionsInput
  ): Promise<Result<PaginatedResult<UserProfile>>>;
  countProfiles(filters?: FilterOptionInput[]): Promise<Result<number>>;
  updateProfile(input: UserProfileUpdate): Promise<Result<UserProfile>>;
  deleteProfile(id: string): Promise<Result<void>>;
  updateAvatar(profileId: string, file: ImageUpload): Promise<Result<UserProfile>>;
  verifyIdentity(profileId: string, file: ImageUpload): Promise<Result<UserProfile>>;
}

// ─────────────────────────────────────────────────────────────
// IMAGE HELPERS
// ─────────────────────────────────────────────────────────────

export const MAX_IMAGE_BYTES = 5 * 1024 * 1024;

const IMAGE_EXTENSIONS: Readonly<Record<string, string>> = {
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/webp': '.webp',
  'image/gif': '.gif',
};

const ALLOWED_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp', '.gif'];

export const AVATAR_FOLDER = 'avatars';
export const IDENTITY_FOLDER = 'identity';

function byteLength(body: ImageUpload['body']): number {
  return body instanceof Blob ? body.size : body.byteLength;
}

/**
 * Extension taken from the file name when it is an image one, else from the content type
 */
export function imageExtension(file: ImageUpload): string | undefined {
  const fromName = extname(file.filename).toLowerCase();
  if (ALLOWED_EXTENSIONS.includes(fromName)) {
    return fromName;
  }
  return IMAGE_EXTENSIONS[file.contentType];
}

function checkImage(file: ImageUpload): Result<string> {
  const extension = IMAGE_EXTENSIONS[file.contentType] !== undefined ? imageExtension(file) : undefined;
  if (extension === undefined) {
    return failure('VALIDATION_ERROR', `Unsupported image type "${file.contentType}"`, {
      allowed: Object.keys(IMAGE_EXTENSIONS),
    });
  }
  const size = byteLength(file.body);
  if (size === 0) {
    return failure('VALIDATION_ERROR', 'Image is empty');
  }
  if (size > MAX_IMAGE_BYTES) {
    return failure('VALIDATION_ERROR', `Image exceeds ${MAX_IMAGE_BYTES} bytes`, { size });
  }
  return success(extension);
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create UserProfileService instance
 */
export function createUserProfileService(deps: {
  profiles: ProfileRepository;
  users: Pick<UserRepository, 'exists'>;
  storage: BlobStorage;
  achievements: Pick<AchievementService, 'badgeFor' | 'handle'>;
  queryConfig?: QueryConfig;
  logger?: Logger;
}): UserProfileService {
  const { profiles, users, storage, achievements } = deps;
  const queryConfig = deps.queryConfig ?? DEFAULT_QUERY_CONFIG;
  const log = (deps.logger ?? rootLogger).child({ component: 'user-profile-service' });

  /**
   * Fire an achievement event for a badge resolved before the workflow wrote anything.
   * An already held badge is logged, anything else fails.
   */
  async function award(
    type: AchievementEventType,
    userId: string,
    badge: Badge
  ): Promise<Result<void>> {
    const result = await achievements.handle({ type, userId }, badge);
    if (result.success) {
      return success(undefined);
    }
    if (result.error.code === 'CONFLICT') {
      log.info({ userId, event: type }, 'Badge already granted, skipping');
      return success(undefined);
    }
    log.error({ userId, event: type, error: result.error }, 'Failed to grant badge');
    return result;
  }

  async function ensureUser(userId: string): Promise<Result<void>> {
    if (!(await users.exists(userId))) {
      return failure('NOT_FOUND', `User ${userId} not found`, { userId });
    }
    return success(undefined);
  }

  async function storeImage(
    profileId: string,
    file: ImageUpload,
    folder: string
  ): Promise<Result<UserProfile>> {
    const valid = checkIdentifier(profileId);
    if (!valid.success) {
      return valid;
    }
    const extension = checkImage(file);
    if (!extension.success) {
      return extension;
    }

    try {
      const profile = await profiles.findById(profileId);
      const path = await storage.upload(
        `${folder}/${profile.userId}${extension.data}`,
        file.body,
        file.contentType
      );
      const url = storage.getPublicUrl(path);

      const record: UserProfileRecord = { id: profile.id, updatedAt: new Date() };
      if (folder === IDENTITY_FOLDER) {
        record.identityImageUrl = url;
      } else {
        record.avatarUrl = url;
      }
      return success(await profiles.update(record));
    } catch (error) {
      return toFailure(error, log, `store ${folder} image`);
    }
  }

  return {
    async createProfile(input: UserProfileCreate): Promise<Result<UserProfile>> {
      const valid = validate(profileCreateSchema, input);
      if (!valid.success) {
        return valid;
      }

      let profile: UserProfile;
      let badge: Badge;
      try {
        const user = await ensureUser(input.userId);
        if (!user.success) {
          return user;
        }

        const existing = await profiles.count(buildEqualityFilters({ userId: input.userId }));
        if (existing > 0) {
          return failure('CONFLICT', `User ${input.userId} already has a profile`, {
            userId: input.userId,
          });
        }

        const resolved = await achievements.badgeFor('PROFILE_CREATED');
        if (!resolved.success) {
          return resolved;
        }
        badge = resolved.data;

        profile = await profiles.create(input);
      } catch (error) {
        return toFailure(error, log, 'create profile');
      }

      log.info({ userId: profile.userId, profileId: profile.id }, 'Profile created');

      const awarded = await award('PROFILE_CREATED', profile.userId, badge);
      if (!awarded.success) {
        return awarded;
      }
      return success(profile);
    },

    async getProfile(id: string): Promise<Result<UserProfile>> {
      const valid = checkIdentifier(id);
      if (!valid.success) {
        return valid;
      }
      return execute(log, 'get profile', () => profiles.findById(id));
    },

    async getProfileByUserId(userId: string): Promise<Result<UserProfile>> {
      const valid = checkIdentifier(userId);
      if (!valid.success) {
        return valid;
      }

      try {
        const [profile] = await profiles.findByField('userId', userId);
        if (profile === undefined) {
          return failure('NOT_FOUND', `No profile for user ${userId}`);
        }
        return success(profile);
      } catch (error) {
        return toFailure(error, log, 'get profile by user');
      }
    },

    async findProfilesByFullname(
      fullname: string,
      options: ListOptionsInput
    ): Promise<Result<PaginatedResult<UserProfile>>> {
      if (fullname.trim() === '') {
        return failure('VALIDATION_ERROR', 'fullname is required');
      }
      return paginate(profiles, options, queryConfig, log, 'find profiles by fullname', [
        { field: 'fullname', operator: 'like', value: fullname.trim() },
      ]);
    },

    async listProfiles(
      options: ListOptionsInput
    ): Promise<Result<PaginatedResult<UserProfile>>> {
      return paginate(profiles, options, queryConfig, log, 'list profiles');
    },

    async searchProfiles(
      term: string,
      options: ListOptionsInput
    ): Promise<Result<PaginatedResult<UserProfile>>> {
      return paginate(profiles, { ...options, search: term }, queryConfig, log, 'search profiles');
    },

    async countProfiles(filters?: FilterOptionInput[]): Promise<Result<number>> {
      const normalized = normalizeFilters(filters, queryConfig);
      if (!normalized.success) {
        return normalized;
      }
      return execute(log, 'count profiles', () => profiles.count(normalized.data));
    },

    async updateProfile(input: UserProfileUpdate): Promise<Result<UserProfile>> {
      const valid = validate(profileUpdateSchema, input);
      if (!valid.success) {
        return valid;
      }

      try {
        const existing = await profiles.findById(input.id);
        if (existing.userId !== '') {
          const user = await ensureUser(existing.userId);
          if (!user.success) {
            return user;
          }
        }

        const merged = mergeNonZero(
          { fullname: existing.fullname, bio: existing.bio },
          { fullname: input.fullname, bio: input.bio }
        );
        const profile = await profiles.update({
          id: existing.id,
          userId: existing.userId,
          ...merged,
          updatedAt: new Date(),
        });
        log.info({ profileId: profile.id }, 'Profile updated');
        return success(profile);
      } catch (error) {
        return toFailure(error, log, 'update profile');
      }
    },

    async deleteProfile(id: string): Promise<Result<void>> {
      const valid = checkIdentifier(id);
      if (!valid.success) {
        return valid;
      }

      try {
        if (!(await profiles.exists(id))) {
          return failure('NOT_FOUND', `Profile ${id} not found`);
        }
        await profiles.delete(id);
        log.info({ profileId: id }, 'Profile deleted');
        return success(undefined);
      } catch (error) {
        return toFailure(error, log, 'delete profile');
      }
    },

    async updateAvatar(profileId: string, file: ImageUpload): Promise<Result<UserProfile>> {
      return storeImage(profileId, file, AVATAR_FOLDER);
    },

    async verifyIdentity(profileId: string, file: ImageUpload): Promise<Result<UserProfile>> {
      const resolved = await achievements.badgeFor('IDENTITY_VERIFIED');
      if (!resolved.success) {
        return resolved;
      }

      const stored = await storeImage(profileId, file, IDENTITY_FOLDER);
      if (!stored.success) {
        return stored;
      }

      log.info({ profileId, userId: stored.data.userId }, 'Identity image stored');
      const awarded = await award('IDENTITY_VERIFIED', stored.data.userId, resolved.data);
      if (!awarded.success) {
        return awarded;
      }
      return stored;
    },
  };
}
