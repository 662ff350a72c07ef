/**
 * Badge-grant rule
 *
 * Per (user, badge) pair:  NO_GRANT --event--> GRANTED
 *                          GRANTED  --event--> GRANTED (reported as a conflict)
 */

import type { AchievementEventType, AchievementRuleTable, GrantState } from '../types/index.js';

export const DEFAULT_ACHIEVEMENT_RULES: AchievementRuleTable = {
  PROFILE_CREATED: 'Explorer',
  IDENTITY_VERIFIED: 'Verified Locale',
};

export interface GrantTransition {
  next: GrantState;
  outcome: 'grant' | 'already-granted';
}

export function badgeNameFor(rules: AchievementRuleTable, event: AchievementEventType): string {
  return rules[event];
}

export function transition(current: GrantState): GrantTransition {
  return current === 'NO_GRANT'
    ? { next: 'GRANTED', outcome: 'grant' }
    : { next: 'GRANTED', outcome: 'already-granted' };
}
