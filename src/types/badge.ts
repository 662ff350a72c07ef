/**
 * Badge Types
 * Achievement badges and their grants to users
 */

export interface Badge {
  id: string;
  name: string;
  description: string;
  iconUrl: string;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface BadgeCreate {
  name: string;
  description?: string;
  iconUrl?: string;
}

export interface BadgeUpdate {
  id: string;
  name?: string;
  description?: string;
  iconUrl?: string;
}

/**
 * Grant record: one per (user, badge) pair
 */
export interface UserBadge {
  id: string;
  userId: string;
  badgeId: string;
  createdAt: Date;
  badge: Badge | null;
}

export interface UserBadgeCreate {
  userId: string;
  badgeId: string;
}

/**
 * Grants are immutable; updates only carry the id
 */
export interface UserBadgeUpdate {
  id: string;
}
