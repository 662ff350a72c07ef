/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the backends.
 * All business rules live here.
 */

// Repositories
export type { UserRepository, UserViewRow } from './user.db.js';
export { createUserRepository, mapEntryToUser, USER_FIELDS } from './user.db.js';
export type { ProfileRepository } from './profile.db.js';
export { createProfileRepository, PROFILE_FIELDS, PROFILE_SELECT } from './profile.db.js';
export type { BadgeRepository } from './badge.db.js';
export { createBadgeRepository, BADGE_FIELDS } from './badge.db.js';
export type { UserBadgeRepository } from './user-badge.db.js';
export { createUserBadgeRepository, USER_BADGE_FIELDS } from './user-badge.db.js';

// Blob storage
export type { BlobStorage, BlobBody } from './file.storage.js';
export { createSupabaseStorageAdapter } from './file.storage.js';

// UserService
export type { UserService } from './user.service.js';
export { createUserService } from './user.service.js';

// BadgeService
export type { BadgeService } from './badge.service.js';
export { createBadgeService } from './badge.service.js';

// AchievementService
export type { AchievementService } from './achievement.service.js';
export { createAchievementService } from './achievement.service.js';
export type { GrantTransition } from './achievement.rules.js';
export { DEFAULT_ACHIEVEMENT_RULES, badgeNameFor, transition } from './achievement.rules.js';

// UserProfileService
export type { UserProfileService } from './user-profile.service.js';
export {
  createUserProfileService,
  imageExtension,
  MAX_IMAGE_BYTES,
  AVATAR_FOLDER,
  IDENTITY_FOLDER,
} from './user-profile.service.js';

// UserBadgeService
export type { UserBadgeService } from './user-badge.service.js';
export { createUserBadgeService } from './user-badge.service.js';

// Helpers
export { mergeNonZero } from './merge.js';
