/**
 * AchievementService Implementation
 * Applies the badge-grant rule to workflow events.
 *
 * A second grant of the same badge fails with CONFLICT. Callers that only
 * want the badge to be held treat that as success.
 */

import { logger as rootLogger, type Logger } from '../lib/logger.js';
import {
  buildEqualityFilters,
  failure,
  success,
  type AchievementEvent,
  type AchievementEventType,
  type AchievementRuleTable,
  type Badge,
  type GrantState,
  type Result,
  type UserBadge,
} from '../types/index.js';

import { badgeNameFor, DEFAULT_ACHIEVEMENT_RULES, transition } from './achievement.rules.js';
import type { BadgeRepository } from './badge.db.js';
import { checkIdentifier, toFailure } from './service.helpers.js';
import type { UserBadgeRepository } from './user-badge.db.js';

export interface AchievementService {
  /** Badge the rule table awards for the event; NOT_FOUND when it is not seeded */
  badgeFor(type: AchievementEventType): Promise<Result<Badge>>;
  /** `badge` skips the lookup when the caller resolved it beforehand */
  handle(event: AchievementEvent, badge?: Badge): Promise<Result<UserBadge>>;
  grantState(userId: string, badgeName: string): Promise<Result<GrantState>>;
}

/**
 * Create AchievementService instance
 */
export function createAchievementService(deps: {
  badges: Pick<BadgeRepository, 'findByField'>;
  userBadges: Pick<UserBadgeRepository, 'count' | 'create'>;
  rules?: AchievementRuleTable;
  logger?: Logger;
}): AchievementService {
  const { badges, userBadges } = deps;
  const rules = deps.rules ?? DEFAULT_ACHIEVEMENT_RULES;
  const log = (deps.logger ?? rootLogger).child({ component: 'achievement-service' });

  async function stateOf(userId: string, badgeId: string): Promise<GrantState> {
    const held = await userBadges.count(buildEqualityFilters({ userId, badgeId }));
    return held > 0 ? 'GRANTED' : 'NO_GRANT';
  }

  async function findBadge(type: AchievementEventType): Promise<Result<Badge>> {
    const badgeName = badgeNameFor(rules, type);
    const [badge] = await badges.findByField('name', badgeName);
    if (badge === undefined) {
      return failure('NOT_FOUND', `Badge "${badgeName}" not found`, { event: type });
    }
    return success(badge);
  }

  return {
    async badgeFor(type: AchievementEventType): Promise<Result<Badge>> {
      try {
        return await findBadge(type);
      } catch (error) {
        return toFailure(error, log, `resolve badge for ${type}`);
      }
    },

    async handle(event: AchievementEvent, resolved?: Badge): Promise<Result<UserBadge>> {
      const valid = checkIdentifier(event.userId);
      if (!valid.success) {
        return valid;
      }

      try {
        let badge = resolved;
        if (badge === undefined) {
          const found = await findBadge(event.type);
          if (!found.success) {
            return found;
          }
          badge = found.data;
        }
        const badgeName = badge.name;

        const step = transition(await stateOf(event.userId, badge.id));
        if (step.outcome === 'already-granted') {
          return failure('CONFLICT', `User already holds badge "${badgeName}"`, {
            userId: event.userId,
            badgeId: badge.id,
          });
        }

        const grant = await userBadges.create({ userId: event.userId, badgeId: badge.id });
        log.info(
          { userId: event.userId, badgeId: badge.id, event: event.type },
          `Badge "${badgeName}" granted`
        );
        return success(grant);
      } catch (error) {
        return toFailure(error, log, `grant badge for ${event.type}`);
      }
    },

    async grantState(userId: string, badgeName: string): Promise<Result<GrantState>> {
      const valid = checkIdentifier(userId);
      if (!valid.success) {
        return valid;
      }

      try {
        const [badge] = await badges.findByField('name', badgeName);
        if (badge === undefined) {
          return failure('NOT_FOUND', `Badge "${badgeName}" not found`);
        }
        return success(await stateOf(userId, badge.id));
      } catch (error) {
        return toFailure(error, log, 'read grant state');
      }
    },
  };
}
