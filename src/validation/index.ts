/**
 * Validation Engine Exports
 */

export type { Rule, RuleName } from './rules.js';
export {
  rules,
  checkRule,
  isZeroValue,
  NIL_UUID,
  PASSWORD_MIN_LENGTH,
} from './rules.js';
export type {
  RuleSchema,
  ValidationIssue,
  PayloadSchema,
} from './validator.js';
export { defineSchema, validate, validateMany } from './validator.js';
export {
  identifierSchema,
  userCreateSchema,
  userUpdateSchema,
  profileCreateSchema,
  profileUpdateSchema,
  badgeCreateSchema,
  badgeUpdateSchema,
  userBadgeCreateSchema,
  emailLookupSchema,
  nameLookupSchema,
} from './schemas.js';
