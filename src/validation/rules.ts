/**
 * Validation Rules
 * Declarative rule values and the checks behind them
 */

import { z } from 'zod';

export type Rule =
  | { kind: 'required' }
  | { kind: 'min'; limit: number }
  | { kind: 'max'; limit: number }
  | { kind: 'email' }
  | { kind: 'identifier' }
  | { kind: 'password' };

export type RuleName = Rule['kind'];

const RULE_NAMES: readonly RuleName[] = [
  'required',
  'min',
  'max',
  'email',
  'identifier',
  'password',
];

export const NIL_UUID = '00000000-0000-0000-0000-000000000000';
export const PASSWORD_MIN_LENGTH = 8;

const emailFormat = z.string().email();
const uuidFormat = z.string().uuid();

export const rules = {
  required: (): Rule => ({ kind: 'required' }),
  min: (limit: number): Rule => ({ kind: 'min', limit }),
  max: (limit: number): Rule => ({ kind: 'max', limit }),
  email: (): Rule => ({ kind: 'email' }),
  identifier: (): Rule => ({ kind: 'identifier' }),
  password: (): Rule => ({ kind: 'password' }),
} as const;

export function isRuleName(value: unknown): value is RuleName {
  return typeof value === 'string' && (RULE_NAMES as readonly string[]).includes(value);
}

/**
 * Zero value of a field: nothing, empty string, empty list, 0 or an unset date
 */
export function isZeroValue(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === 'string') {
    return value === '';
  }
  if (typeof value === 'number') {
    return value === 0;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime());
  }
  return false;
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

function checkMin(limit: number, value: unknown): string[] {
  if (typeof value === 'string' && value.length < limit) {
    return [`must be at least ${limit} characters long`];
  }
  if (Array.isArray(value) && value.length < limit) {
    return [`must have at least ${limit} items`];
  }
  if (typeof value === 'number' && value < limit) {
    return [`must be at least ${limit}`];
  }
  return [];
}

function checkMax(limit: number, value: unknown): string[] {
  if (typeof value === 'string' && value.length > limit) {
    return [`must be no more than ${limit} characters long`];
  }
  if (Array.isArray(value) && value.length > limit) {
    return [`must have no more than ${limit} items`];
  }
  if (typeof value === 'number' && value > limit) {
    return [`must be no more than ${limit}`];
  }
  return [];
}

function checkEmail(value: unknown): string[] {
  if (typeof value !== 'string') {
    return ['must be a string'];
  }
  return emailFormat.safeParse(value).success
    ? []
    : ['must be a valid email address'];
}

function checkIdentifier(value: unknown): string[] {
  if (typeof value !== 'string' || !uuidFormat.safeParse(value).success) {
    return ['must be a valid UUID'];
  }
  if (value === NIL_UUID) {
    return ['cannot be the nil UUID'];
  }
  return [];
}

/**
 * Every missing password ingredient is listed, not just the first
 */
function checkPassword(value: unknown): string[] {
  if (typeof value !== 'string') {
    return ['must be a string'];
  }

  const missing: string[] = [];
  if ([...value].length < PASSWORD_MIN_LENGTH) {
    missing.push(`be at least ${PASSWORD_MIN_LENGTH} characters long`);
  }
  if (!/\p{Lu}/u.test(value)) {
    missing.push('contain at least one uppercase letter');
  }
  if (!/\p{Ll}/u.test(value)) {
    missing.push('contain at least one lowercase letter');
  }
  if (!/\p{N}/u.test(value)) {
    missing.push('contain at least one number');
  }
  if (!/[\p{P}\p{S}]/u.test(value)) {
    missing.push('contain at least one special character');
  }

  return missing.length > 0 ? [`must ${missing.join(', ')}`] : [];
}

/**
 * Apply one rule to a value and return its violation messages.
 * Rules other than `required` ignore absent values.
 */
export function checkRule(rule: Rule, value: unknown): string[] {
  if (rule.kind === 'required') {
    return isZeroValue(value) ? ['is required'] : [];
  }
  if (isAbsent(value)) {
    return [];
  }

  switch (rule.kind) {
    case 'min':
      return checkMin(rule.limit, value);
    case 'max':
      return checkMax(rule.limit, value);
    case 'email':
      return checkEmail(value);
    case 'identifier':
      return checkIdentifier(value);
    case 'password':
      return checkPassword(value);
  }
}
