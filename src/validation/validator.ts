/**
 * Validation Engine
 * Compiles per-payload rule sets into zod schemas and reports every violation
 */

import { z } from 'zod';

import { failure, success, type Result } from '../types/index.js';

import { checkRule, isRuleName, type Rule, type RuleName } from './rules.js';

/**
 * Rule list per field of a payload type
 */
export type RuleSchema<T> = { readonly [K in keyof T]?: readonly Rule[] };

export interface ValidationIssue {
  field: string;
  rule: RuleName | 'type';
  message: string;
  index?: number;
}

export interface PayloadSchema<T> {
  readonly name: string;
  readonly rules: RuleSchema<T>;
  readonly object: z.ZodTypeAny;
}

function fieldSchema(fieldRules: readonly Rule[]): z.ZodTypeAny {
  return z.unknown().superRefine((value, ctx) => {
    for (const rule of fieldRules) {
      for (const message of checkRule(rule, value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message,
          params: { rule: rule.kind },
        });
      }
    }
  });
}

/**
 * Declare the rules of a payload type once; the zod schema is built here
 */
export function defineSchema<T extends object>(
  name: string,
  ruleSchema: RuleSchema<T>
): PayloadSchema<T> {
  const shape: Record<string, z.ZodTypeAny> = {};
  const entries: [string, readonly Rule[] | undefined][] =
    Object.entries(ruleSchema);
  for (const [field, fieldRules] of entries) {
    if (fieldRules !== undefined && fieldRules.length > 0) {
      shape[field] = fieldSchema(fieldRules);
    }
  }

  return {
    name,
    rules: ruleSchema,
    object: z.object(shape).passthrough(),
  };
}

function toIssue(issue: z.ZodIssue, indexed: boolean): ValidationIssue {
  const [head, ...rest] = issue.path;
  const result: ValidationIssue = {
    field: issue.path.map(String).join('.'),
    rule: 'type',
    message: issue.message,
  };

  if (indexed && typeof head === 'number') {
    result.index = head;
    result.field = rest.map(String).join('.');
  }

  if (issue.code === z.ZodIssueCode.custom) {
    const rule: unknown = issue.params?.['rule'];
    if (isRuleName(rule)) {
      result.rule = rule;
    }
  }

  return result;
}

function describeIssue(issue: ValidationIssue): string {
  const prefix = issue.index !== undefined ? `[${issue.index}]` : '';
  const field = issue.field !== '' ? issue.field : 'payload';
  const separator = prefix !== '' && issue.field !== '' ? '.' : '';
  return `${prefix}${separator}${field} ${issue.message}`;
}

function validationFailure(schemaName: string, issues: ValidationIssue[]) {
  return failure(
    'VALIDATION_ERROR',
    `${schemaName} validation failed: ${issues.map(describeIssue).join('; ')}`,
    { issues }
  );
}

/**
 * Check a payload against its schema. All fields are checked before reporting.
 */
export function validate<T extends object>(
  schema: PayloadSchema<T>,
  payload: T
): Result<T> {
  const parsed = schema.object.safeParse(payload);
  if (parsed.success) {
    return success(payload);
  }
  return validationFailure(
    schema.name,
    parsed.error.issues.map((issue) => toIssue(issue, false))
  );
}

/**
 * Check every element of a collection; issues carry the element index
 */
export function validateMany<T extends object>(
  schema: PayloadSchema<T>,
  payloads: readonly T[]
): Result<T[]> {
  const parsed = z.array(schema.object).safeParse(payloads);
  if (parsed.success) {
    return success([...payloads]);
  }
  return validationFailure(
    schema.name,
    parsed.error.issues.map((issue) => toIssue(issue, true))
  );
}
