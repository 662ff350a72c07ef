/**
 * List Query Parsing
 * Turns `?page=&per_page=&sort_by=&sort_order=&search=&filter=field:op:value`
 * into an untrusted list descriptor for the services
 */

import type { Context } from 'hono';
import { z } from 'zod';

import {
  failure,
  success,
  type FilterOptionInput,
  type ListOptionsInput,
  type Result,
} from '../../types/index.js';

const listQuerySchema = z.object({
  page: z.coerce.number().int().optional(),
  per_page: z.coerce.number().int().optional(),
  sort_by: z.string().optional(),
  sort_order: z.string().optional(),
  search: z.string().optional(),
});

const LIST_OPERATORS = ['in', 'not_in'];

/**
 * Parse one `field:operator:value` expression. The value keeps any further colons;
 * list operators take a comma separated value.
 */
export function parseFilterExpression(expression: string): FilterOptionInput {
  const [field = '', operator = '', ...rest] = expression.split(':');
  const raw = rest.join(':');
  const value = LIST_OPERATORS.includes(operator.trim())
    ? raw
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item !== '')
    : raw;
  return { field: field.trim(), operator: operator.trim(), value };
}

export function parseListQuery(c: Context): Result<ListOptionsInput> {
  const parsed = listQuerySchema.safeParse(c.req.query());
  if (!parsed.success) {
    return failure(
      'VALIDATION_ERROR',
      'Invalid list query',
      { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) }
    );
  }

  const query = parsed.data;
  const input: ListOptionsInput = {
    filters: (c.req.queries('filter') ?? []).map(parseFilterExpression),
  };
  if (query.page !== undefined) input.page = query.page;
  if (query.per_page !== undefined) input.perPage = query.per_page;
  if (query.sort_by !== undefined && query.sort_by !== '') input.sortBy = query.sort_by;
  if (query.sort_order !== undefined) input.sortOrder = query.sort_order;
  if (query.search !== undefined) input.search = query.search;

  return success(input);
}
