/**
 * User Profile Types
 */

import type { User } from './user.js';

/**
 * Profile read model, with the owning account joined in when available
 */
export interface UserProfile {
  id: string;
  userId: string;
  fullname: string;
  bio: string;
  avatarUrl: string;
  identityImageUrl: string;
  createdAt: Date;
  updatedAt: Date | null;
  user: User | null;
}

export interface UserProfileCreate {
  userId: string;
  fullname: string;
  bio?: string;
  avatarUrl?: string;
}

/**
 * Partial profile update; only non-empty fields replace stored values
 */
export interface UserProfileUpdate {
  id: string;
  fullname?: string;
  bio?: string;
}

/**
 * Write model used by the repository when persisting a merged profile
 */
export interface UserProfileRecord {
  id: string;
  userId?: string;
  fullname?: string;
  bio?: string;
  avatarUrl?: string;
  identityImageUrl?: string;
  updatedAt?: Date;
}

/**
 * Uploaded image, as handed over by the HTTP layer
 */
export interface ImageUpload {
  filename: string;
  contentType: string;
  body: Blob | ArrayBuffer | Uint8Array;
}
