/**
 * BadgeService Unit Tests
 *
 * GUARDRAILS:
 * - Badge names are unique
 * - Result pattern required (no thrown errors)
 */

import { describe, it, expect, beforeEach } from 'vitest';

import type { BadgeService } from '@/services/badge.service.js';
import { createBadgeService } from '@/services/badge.service.js';
import type { Badge } from '@/types/index.js';

import {
  badgeFixture,
  createInMemoryBadgeRepository,
} from '../../helpers/in-memory-repository.js';

const MISSING_ID = '99999999-9999-4999-8999-999999999999';

describe('BadgeService', () => {
  let badges: ReturnType<typeof createInMemoryBadgeRepository>;
  let service: BadgeService;
  let explorer: Badge;

  beforeEach(() => {
    explorer = badgeFixture({ name: 'Explorer', createdAt: new Date('2024-01-01T00:00:00.000Z') });
    badges = createInMemoryBadgeRepository([
      explorer,
      badgeFixture({
        name: 'Verified Locale',
        description: 'Verified identity',
        createdAt: new Date('2024-01-02T00:00:00.000Z'),
      }),
    ]);
    service = createBadgeService({ badges });
  });

  describe('createBadge', () => {
    it('should create a badge with defaults for optional fields', async () => {
      const result = await service.createBadge({ name: 'Mentor' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.name).toBe('Mentor');
        expect(result.data.description).toBe('');
      }
      expect(badges.items).toHaveLength(3);
    });

    it('should reject a duplicate name', async () => {
      const result = await service.createBadge({ name: 'Explorer' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('CONFLICT');
        expect(result.error.message).toBe('Badge "Explorer" already exists');
      }
    });

    it('should require a name', async () => {
      const result = await service.createBadge({ name: '' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('badge validation failed: name is required');
      }
    });
  });

  describe('getBadge / getBadgeByName', () => {
    it('should return a badge by id', async () => {
      const result = await service.getBadge(explorer.id);

      expect(result).toEqual({ success: true, data: explorer });
    });

    it('should return a badge by name', async () => {
      const result = await service.getBadgeByName('Verified Locale');

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.description).toBe('Verified identity');
      }
    });

    it('should return NOT_FOUND for an unknown name', async () => {
      const result = await service.getBadgeByName('Nope');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_FOUND');
        expect(result.error.message).toBe('Badge "Nope" not found');
      }
    });
  });

  describe('listBadges / searchBadges / countBadges', () => {
    it('should sort by the requested field', async () => {
      const result = await service.listBadges({ sortBy: 'name', sortOrder: 'desc' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.items.map((badge) => badge.name)).toEqual(['Verified Locale', 'Explorer']);
      }
    });

    it('should search name and description', async () => {
      const result = await service.searchBadges('identity', {});

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.items.map((badge) => badge.name)).toEqual(['Verified Locale']);
        expect(result.data.pagination.total).toBe(1);
      }
    });

    it('should count with filters', async () => {
      const result = await service.countBadges([
        { field: 'createdAt', operator: 'gt', value: '2024-01-01T12:00:00.000Z' },
      ]);

      expect(result).toEqual({ success: true, data: 1 });
    });
  });

  describe('updateBadge', () => {
    it('should merge non-empty fields', async () => {
      const result = await service.updateBadge({
        id: explorer.id,
        name: '',
        description: 'Set up a profile',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.name).toBe('Explorer');
        expect(result.data.description).toBe('Set up a profile');
      }
    });

    it('should reject renaming onto another badge', async () => {
      const result = await service.updateBadge({ id: explorer.id, name: 'Verified Locale' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('CONFLICT');
        expect(result.error.message).toBe('Badge "Verified Locale" already exists');
      }
    });
  });

  describe('deleteBadge', () => {
    it('should delete a badge', async () => {
      expect(await service.deleteBadge(explorer.id)).toEqual({ success: true, data: undefined });
      expect(badges.items).toHaveLength(1);
    });

    it('should return NOT_FOUND for an unknown badge', async () => {
      const result = await service.deleteBadge(MISSING_ID);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_FOUND');
      }
    });
  });
});

