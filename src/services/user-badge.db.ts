/**
 * User Badge Repository
 * Table `users_badge`: one grant per (user, badge), badge embedded on read
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { createTableRepository, type FieldMap, type Repository } from '../db/index.js';
import type { UserBadge, UserBadgeCreate, UserBadgeUpdate } from '../types/index.js';

import { mapRowToBadge, type BadgeRow } from './badge.db.js';

export type UserBadgeRepository = Repository<UserBadgeCreate, UserBadgeUpdate, UserBadge>;

interface UserBadgeRow {
  id: string;
  user_id: string;
  badge_id: string;
  created_at: string;
  badge?: BadgeRow | null;
}

export const USER_BADGE_FIELDS: FieldMap = {
  id: { column: 'id', type: 'string' },
  userId: { column: 'user_id', type: 'string' },
  badgeId: { column: 'badge_id', type: 'string' },
  createdAt: { column: 'created_at', type: 'timestamp' },
};

function mapRowToUserBadge(row: UserBadgeRow): UserBadge {
  return Object.freeze({
    id: row.id,
    userId: row.user_id,
    badgeId: row.badge_id,
    createdAt: new Date(row.created_at),
    badge: row.badge !== undefined && row.badge !== null ? mapRowToBadge(row.badge) : null,
  });
}

export function createUserBadgeRepository(supabase: SupabaseClient): UserBadgeRepository {
  return createTableRepository<UserBadgeCreate, UserBadgeUpdate, UserBadge, UserBadgeRow>(
    supabase,
    {
      table: 'users_badge',
      resource: 'user badge',
      select: '*, badge:badges!users_badge_badge_id_fkey(*)',
      fields: USER_BADGE_FIELDS,
      searchColumns: [],
      hasUpdatedAt: false,
      toInsertRow: (value) => ({
        user_id: value.userId,
        badge_id: value.badgeId,
      }),
      // grants are immutable
      toUpdateRow: () => ({}),
      fromRow: mapRowToUserBadge,
    }
  );
}
