/**
 * Badge Repository
 * Table `badges`
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { createTableRepository, type FieldMap, type Repository } from '../db/index.js';
import type { Badge, BadgeCreate, BadgeUpdate } from '../types/index.js';

export type BadgeRepository = Repository<BadgeCreate, BadgeUpdate, Badge>;

export interface BadgeRow {
  id: string;
  name: string;
  description: string | null;
  icon_url: string | null;
  created_at: string;
  updated_at: string | null;
}

export const BADGE_FIELDS: FieldMap = {
  id: { column: 'id', type: 'string' },
  name: { column: 'name', type: 'string' },
  description: { column: 'description', type: 'string' },
  createdAt: { column: 'created_at', type: 'timestamp' },
  updatedAt: { column: 'updated_at', type: 'timestamp' },
};

export function mapRowToBadge(row: BadgeRow): Badge {
  return Object.freeze({
    id: row.id,
    name: row.name,
    description: row.description ?? '',
    iconUrl: row.icon_url ?? '',
    createdAt: new Date(row.created_at),
    updatedAt: row.updated_at !== null ? new Date(row.updated_at) : null,
  });
}

export function createBadgeRepository(supabase: SupabaseClient): BadgeRepository {
  return createTableRepository<BadgeCreate, BadgeUpdate, Badge, BadgeRow>(supabase, {
    table: 'badges',
    resource: 'badge',
    select: '*',
    fields: BADGE_FIELDS,
    searchColumns: ['name', 'description'],
    hasUpdatedAt: true,
    toInsertRow: (value) => ({
      name: value.name,
      description: value.description ?? '',
      icon_url: value.iconUrl ?? '',
    }),
    toUpdateRow: (value) => ({
      name: value.name,
      description: value.description,
      icon_url: value.iconUrl,
    }),
    fromRow: mapRowToBadge,
  });
}
