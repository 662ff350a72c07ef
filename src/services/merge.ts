/**
 * Merge-on-update
 */

import { isZeroValue } from '../validation/index.js';

/**
 * Overlay the non-zero fields of a patch onto an existing value.
 * Zero values (undefined, null, '', 0, empty list, unset date) never overwrite.
 */
export function mergeNonZero<T extends object>(existing: T, patch: Partial<T>): T {
  const overrides = Object.fromEntries(
    Object.entries(patch).filter(([, value]) => !isZeroValue(value))
  );
  return { ...existing, ...overrides };
}
