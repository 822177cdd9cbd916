/**
 * SQL building helpers for listing queries.
 */

import type { SqlParams } from './types.ts';

/** Alias of the content_item table in listing statements */
export const ITEM_ALIAS = 'i';

/**
 * Escape ILIKE wildcard characters (% and _) in user input.
 * Prevents users from injecting wildcards that match unintended patterns.
 */
export function escapeIlikeWildcards(input: string): string {
  return input.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

/** `%term%` pattern with wildcards in the term escaped */
export function containsPattern(term: string): string {
  return `%${escapeIlikeWildcards(term)}%`;
}

/**
 * Creates a positional parameter accumulator.
 */
export function createSqlParams(initial: unknown[] = []): SqlParams {
  const values = [...initial];
  return {
    values,
    add(value: unknown): string {
      values.push(value);
      return `$${values.length}`;
    },
  };
}
