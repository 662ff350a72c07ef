/**
 * Filter Resolution
 * Maps read-model field names onto backend fields and checks that each
 * operator and value makes sense for the field's type before any backend call
 */

import {
  RepositoryError,
  type FilterOperator,
  type FilterOption,
  type FilterScalar,
  type FilterValue,
} from '../types/index.js';

export type FieldType = 'string' | 'number' | 'boolean' | 'timestamp';

export interface FieldMapping {
  /** Backend column or attribute name */
  column: string;
  type: FieldType;
}

export type FieldMap = Readonly<Record<string, FieldMapping>>;

/**
 * Filter with its backend column and a value already coerced to the field type
 */
export type ResolvedFilter =
  | {
      field: string;
      column: string;
      type: FieldType;
      operator: Exclude<FilterOperator, 'in' | 'not_in'>;
      value: FilterScalar;
    }
  | {
      field: string;
      column: string;
      type: FieldType;
      operator: 'in' | 'not_in';
      value: FilterScalar[];
    };

const OPERATORS_BY_TYPE: Readonly<Record<FieldType, readonly FilterOperator[]>> = {
  string: ['eq', 'ne', 'in', 'not_in', 'like', 'starts_with', 'ends_with'],
  number: ['eq', 'ne', 'gt', 'lt', 'gte', 'lte', 'in', 'not_in'],
  boolean: ['eq', 'ne'],
  timestamp: ['eq', 'ne', 'gt', 'lt', 'gte', 'lte'],
};

export function supportsOperator(type: FieldType, operator: FilterOperator): boolean {
  return OPERATORS_BY_TYPE[type].includes(operator);
}

/**
 * Coerce a filter value to the field type; undefined when it cannot be
 */
export function coerceScalar(type: FieldType, value: FilterScalar): FilterScalar | undefined {
  switch (type) {
    case 'string':
      return typeof value === 'string' ? value : undefined;
    case 'number': {
      if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
      }
      if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
      }
      return undefined;
    }
    case 'boolean':
      if (typeof value === 'boolean') {
        return value;
      }
      if (value === 'true' || value === 'false') {
        return value === 'true';
      }
      return undefined;
    case 'timestamp': {
      const date =
        value instanceof Date
          ? value
          : typeof value === 'string' || typeof value === 'number'
            ? new Date(value)
            : undefined;
      return date !== undefined && !Number.isNaN(date.getTime()) ? date : undefined;
    }
  }
}

function invalid(message: string, filter: FilterOption): RepositoryError {
  return new RepositoryError('VALIDATION_ERROR', message, {
    details: { field: filter.field, operator: filter.operator },
  });
}

function isList(value: FilterValue): value is readonly (string | number)[] {
  return Array.isArray(value);
}

export function resolveFilter(filter: FilterOption, fields: FieldMap): ResolvedFilter {
  const mapping = fields[filter.field];
  if (mapping === undefined) {
    throw invalid(`Cannot filter on unknown field "${filter.field}"`, filter);
  }
  if (!supportsOperator(mapping.type, filter.operator)) {
    throw invalid(
      `Operator "${filter.operator}" is not supported for ${mapping.type} field "${filter.field}"`,
      filter
    );
  }

  const base = { field: filter.field, column: mapping.column, type: mapping.type };

  if (filter.operator === 'in' || filter.operator === 'not_in') {
    if (!isList(filter.value)) {
      throw invalid(`Operator "${filter.operator}" needs a list value`, filter);
    }
    const values: FilterScalar[] = [];
    for (const item of filter.value) {
      const coerced = coerceScalar(mapping.type, item);
      if (coerced === undefined) {
        throw invalid(`Value "${String(item)}" does not fit ${mapping.type} field "${filter.field}"`, filter);
      }
      values.push(coerced);
    }
    return { ...base, operator: filter.operator, value: values };
  }

  if (isList(filter.value)) {
    throw invalid(`Operator "${filter.operator}" needs a single value`, filter);
  }
  const coerced = coerceScalar(mapping.type, filter.value);
  if (coerced === undefined) {
    throw invalid(
      `Value "${String(filter.value)}" does not fit ${mapping.type} field "${filter.field}"`,
      filter
    );
  }
  return { ...base, operator: filter.operator, value: coerced };
}

export function resolveFilters(
  filters: readonly FilterOption[],
  fields: FieldMap
): ResolvedFilter[] {
  return filters.map((filter) => resolveFilter(filter, fields));
}

/**
 * Resolve a sort field to its backend column
 */
export function resolveSortField(sortBy: string, fields: FieldMap): FieldMapping {
  const mapping = fields[sortBy];
  if (mapping === undefined) {
    throw new RepositoryError('VALIDATION_ERROR', `Cannot sort on unknown field "${sortBy}"`, {
      details: { field: sortBy },
    });
  }
  return mapping;
}

function toComparable(value: FilterScalar): string | number | boolean {
  return value instanceof Date ? value.getTime() : value;
}

/**
 * Order two field values of the same type; nulls sort last
 */
export function compareScalars(a: FilterScalar | null, b: FilterScalar | null): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? 1 : -1;
  }
  const left = toComparable(a);
  const right = toComparable(b);
  if (typeof left === 'string' && typeof right === 'string') {
    return left.localeCompare(right);
  }
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  if (typeof left === 'boolean' && typeof right === 'boolean') {
    return Number(left) - Number(right);
  }
  return 0;
}

function sameValue(a: FilterScalar, b: FilterScalar): boolean {
  return toComparable(a) === toComparable(b);
}

/**
 * Evaluate one resolved filter against a field value held in memory
 */
export function matchesFilter(fieldValue: FilterScalar | null, filter: ResolvedFilter): boolean {
  if (filter.operator === 'in' || filter.operator === 'not_in') {
    const found =
      fieldValue !== null && filter.value.some((candidate) => sameValue(fieldValue, candidate));
    return filter.operator === 'in' ? found : !found;
  }

  if (fieldValue === null) {
    return filter.operator === 'ne';
  }

  const expected = filter.value;
  switch (filter.operator) {
    case 'eq':
      return sameValue(fieldValue, expected);
    case 'ne':
      return !sameValue(fieldValue, expected);
    case 'gt':
      return compareScalars(fieldValue, expected) > 0;
    case 'lt':
      return compareScalars(fieldValue, expected) < 0;
    case 'gte':
      return compareScalars(fieldValue, expected) >= 0;
    case 'lte':
      return compareScalars(fieldValue, expected) <= 0;
    case 'like':
    case 'starts_with':
    case 'ends_with': {
      if (typeof fieldValue !== 'string' || typeof expected !== 'string') {
        return false;
      }
      const haystack = fieldValue.toLowerCase();
      const needle = expected.toLowerCase();
      if (filter.operator === 'like') {
        return haystack.includes(needle);
      }
      return filter.operator === 'starts_with'
        ? haystack.startsWith(needle)
        : haystack.endsWith(needle);
    }
  }
}

/**
 * True when the record satisfies every filter
 */
export function matchesAll(
  read: (column: string) => FilterScalar | null,
  filters: readonly ResolvedFilter[]
): boolean {
  return filters.every((filter) => matchesFilter(read(filter.column), filter));
}
