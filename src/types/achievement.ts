/**
 * Achievement Event Types
 * Workflow events that may award a badge
 */

export type AchievementEventType = 'PROFILE_CREATED' | 'IDENTITY_VERIFIED';

export interface AchievementEvent {
  type: AchievementEventType;
  userId: string;
}

/**
 * Per (user, badge) pair a grant is either absent or present, never revoked by a rule
 */
export type GrantState = 'NO_GRANT' | 'GRANTED';

/**
 * Event to badge-name mapping
 */
export type AchievementRuleTable = Readonly<Record<AchievementEventType, string>>;
