/**
 * Filter Resolution Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  compareScalars,
  matchesAll,
  matchesFilter,
  resolveFilter,
  resolveSortField,
  supportsOperator,
  type FieldMap,
} from '@/db/filters.js';
import { PROFILE_FIELDS } from '@/services/profile.db.js';
import { RepositoryError, type FilterOption } from '@/types/index.js';

const FIELDS: FieldMap = {
  ...PROFILE_FIELDS,
  age: { column: 'age', type: 'number' },
  verified: { column: 'is_verified', type: 'boolean' },
};

function resolveError(filter: FilterOption): RepositoryError {
  try {
    resolveFilter(filter, FIELDS);
  } catch (error) {
    if (error instanceof RepositoryError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected resolveFilter to throw');
}

describe('Filter Resolution', () => {
  describe('resolveFilter()', () => {
    it('should map a field onto its column', () => {
      expect(resolveFilter({ field: 'userId', operator: 'eq', value: 'u1' }, FIELDS)).toEqual({
        field: 'userId',
        column: 'user_id',
        type: 'string',
        operator: 'eq',
        value: 'u1',
      });
    });

    it('should coerce values to the field type', () => {
      expect(resolveFilter({ field: 'age', operator: 'gte', value: '42' }, FIELDS).value).toBe(42);
      expect(resolveFilter({ field: 'verified', operator: 'eq', value: 'true' }, FIELDS).value).toBe(
        true
      );
      expect(
        resolveFilter(
          { field: 'createdAt', operator: 'gt', value: '2024-05-01T00:00:00.000Z' },
          FIELDS
        ).value
      ).toEqual(new Date('2024-05-01T00:00:00.000Z'));
      expect(resolveFilter({ field: 'age', operator: 'in', value: ['1', 2] }, FIELDS).value).toEqual(
        [1, 2]
      );
    });

    it('should reject an unknown field', () => {
      const error = resolveError({ field: 'nickname', operator: 'eq', value: 'x' });

      expect(error.kind).toBe('VALIDATION_ERROR');
      expect(error.message).toBe('Cannot filter on unknown field "nickname"');
      expect(error.details).toEqual({ field: 'nickname', operator: 'eq' });
    });

    it('should reject an operator the field type does not support', () => {
      expect(resolveError({ field: 'createdAt', operator: 'like', value: '2024' }).message).toBe(
        'Operator "like" is not supported for timestamp field "createdAt"'
      );
      expect(resolveError({ field: 'verified', operator: 'gt', value: true }).message).toBe(
        'Operator "gt" is not supported for boolean field "verified"'
      );
    });

    it('should reject a value of the wrong shape', () => {
      expect(resolveError({ field: 'id', operator: 'in', value: 'a' }).message).toBe(
        'Operator "in" needs a list value'
      );
      expect(resolveError({ field: 'id', operator: 'eq', value: ['a'] }).message).toBe(
        'Operator "eq" needs a single value'
      );
    });

    it('should reject a value that does not fit the field type', () => {
      expect(resolveError({ field: 'createdAt', operator: 'gt', value: 'yesterday' }).message).toBe(
        'Value "yesterday" does not fit timestamp field "createdAt"'
      );
      expect(resolveError({ field: 'age', operator: 'not_in', value: ['x'] }).message).toBe(
        'Value "x" does not fit number field "age"'
      );
    });
  });

  describe('resolveSortField()', () => {
    it('should return the column mapping', () => {
      expect(resolveSortField('createdAt', FIELDS)).toEqual({
        column: 'created_at',
        type: 'timestamp',
      });
    });

    it('should reject an unknown sort field', () => {
      expect(() => resolveSortField('rank', FIELDS)).toThrow('Cannot sort on unknown field "rank"');
    });
  });

  describe('supportsOperator()', () => {
    it('should allow pattern operators only on strings', () => {
      expect(supportsOperator('string', 'starts_with')).toBe(true);
      expect(supportsOperator('number', 'like')).toBe(false);
    });
  });

  describe('matchesFilter()', () => {
    const like = resolveFilter({ field: 'fullname', operator: 'like', value: 'JO' }, FIELDS);
    const startsWith = resolveFilter(
      { field: 'fullname', operator: 'starts_with', value: 'jo' },
      FIELDS
    );
    const endsWith = resolveFilter({ field: 'fullname', operator: 'ends_with', value: 'NE' }, FIELDS);

    it('should match patterns without regard to case', () => {
      expect(matchesFilter('Jolene', like)).toBe(true);
      expect(matchesFilter('Jolene', startsWith)).toBe(true);
      expect(matchesFilter('Jolene', endsWith)).toBe(true);
      expect(matchesFilter('Ann', like)).toBe(false);
    });

    it('should only let ne and not_in match an absent value', () => {
      expect(matchesFilter(null, resolveFilter({ field: 'bio', operator: 'ne', value: 'x' }, FIELDS))).toBe(
        true
      );
      expect(matchesFilter(null, resolveFilter({ field: 'bio', operator: 'eq', value: 'x' }, FIELDS))).toBe(
        false
      );
      expect(
        matchesFilter(null, resolveFilter({ field: 'bio', operator: 'not_in', value: ['x'] }, FIELDS))
      ).toBe(true);
      expect(
        matchesFilter(null, resolveFilter({ field: 'bio', operator: 'in', value: ['x'] }, FIELDS))
      ).toBe(false);
      expect(matchesFilter(null, like)).toBe(false);
    });

    it('should compare timestamps by instant', () => {
      const after = resolveFilter(
        { field: 'createdAt', operator: 'gt', value: '2024-01-01T00:00:00.000Z' },
        FIELDS
      );
      const equal = resolveFilter(
        { field: 'createdAt', operator: 'eq', value: '2024-01-01T00:00:00.000Z' },
        FIELDS
      );

      expect(matchesFilter(new Date('2024-06-01T00:00:00.000Z'), after)).toBe(true);
      expect(matchesFilter(new Date('2023-06-01T00:00:00.000Z'), after)).toBe(false);
      expect(matchesFilter(new Date('2024-01-01T00:00:00.000Z'), equal)).toBe(true);
    });

    it('should match list membership', () => {
      const within = resolveFilter({ field: 'age', operator: 'in', value: [30, 40] }, FIELDS);
      const outside = resolveFilter({ field: 'age', operator: 'not_in', value: [30, 40] }, FIELDS);

      expect(matchesFilter(30, within)).toBe(true);
      expect(matchesFilter(35, within)).toBe(false);
      expect(matchesFilter(35, outside)).toBe(true);
    });

    it('should require exact code points for string equality', () => {
      const composed = '\u00e9mile';
      const decomposed = 'e\u0301mile';
      const eq = resolveFilter({ field: 'fullname', operator: 'eq', value: composed }, FIELDS);
      const within = resolveFilter({ field: 'fullname', operator: 'in', value: [composed] }, FIELDS);

      expect(matchesFilter(composed, eq)).toBe(true);
      expect(matchesFilter(decomposed, eq)).toBe(false);
      expect(matchesFilter(decomposed, within)).toBe(false);
    });
  });

  describe('matchesAll()', () => {
    it('should require every filter to match', () => {
      const record: Record<string, string | number> = { fullname: 'Jolene', age: 31 };
      const filters = [
        resolveFilter({ field: 'fullname', operator: 'like', value: 'jo' }, FIELDS),
        resolveFilter({ field: 'age', operator: 'lt', value: 30 }, FIELDS),
      ];

      expect(matchesAll((column) => record[column] ?? null, filters)).toBe(false);
      expect(matchesAll((column) => record[column] ?? null, filters.slice(0, 1))).toBe(true);
    });
  });

  describe('compareScalars()', () => {
    it('should sort absent values last', () => {
      const values = ['b', null, 'a'];

      expect(values.sort(compareScalars)).toEqual(['a', 'b', null]);
    });
  });
});
