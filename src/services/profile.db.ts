/**
 * User Profile Repository
 * Table `users_profile`, with the owning account embedded from `users_view`
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { createTableRepository, type FieldMap, type Repository } from '../db/index.js';
import type { UserProfile, UserProfileCreate, UserProfileRecord } from '../types/index.js';

import { mapViewRowToUser, type UserViewRow } from './user.db.js';

export type ProfileRepository = Repository<UserProfileCreate, UserProfileRecord, UserProfile>;

interface ProfileRow {
  id: string;
  user_id: string;
  fullname: string;
  bio: string | null;
  avatar_url: string | null;
  identity_image_url: string | null;
  created_at: string;
  updated_at: string | null;
  user?: UserViewRow | null;
}

export const PROFILE_TABLE = 'users_profile';
export const PROFILE_SELECT = '*, user:users_view!users_profile_user_id_fkey(*)';

export const PROFILE_FIELDS: FieldMap = {
  id: { column: 'id', type: 'string' },
  userId: { column: 'user_id', type: 'string' },
  fullname: { column: 'fullname', type: 'string' },
  bio: { column: 'bio', type: 'string' },
  createdAt: { column: 'created_at', type: 'timestamp' },
  updatedAt: { column: 'updated_at', type: 'timestamp' },
};

function mapRowToProfile(row: ProfileRow): UserProfile {
  return Object.freeze({
    id: row.id,
    userId: row.user_id,
    fullname: row.fullname,
    bio: row.bio ?? '',
    avatarUrl: row.avatar_url ?? '',
    identityImageUrl: row.identity_image_url ?? '',
    createdAt: new Date(row.created_at),
    updatedAt: row.updated_at !== null ? new Date(row.updated_at) : null,
    user: row.user !== undefined && row.user !== null ? mapViewRowToUser(row.user) : null,
  });
}

export function createProfileRepository(supabase: SupabaseClient): ProfileRepository {
  return createTableRepository<UserProfileCreate, UserProfileRecord, UserProfile, ProfileRow>(
    supabase,
    {
      table: PROFILE_TABLE,
      resource: 'user profile',
      select: PROFILE_SELECT,
      fields: PROFILE_FIELDS,
      searchColumns: ['fullname', 'bio'],
      hasUpdatedAt: true,
      toInsertRow: (value) => ({
        user_id: value.userId,
        fullname: value.fullname,
        bio: value.bio ?? '',
        avatar_url: value.avatarUrl ?? '',
      }),
      toUpdateRow: (value) => ({
        user_id: value.userId,
        fullname: value.fullname,
        bio: value.bio,
        avatar_url: value.avatarUrl,
        identity_image_url: value.identityImageUrl,
        updated_at: value.updatedAt?.toISOString(),
      }),
      fromRow: mapRowToProfile,
    }
  );
}
