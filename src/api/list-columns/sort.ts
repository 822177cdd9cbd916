/**
 * Rewrites a requested column sort into an attribute sort the store understands.
 */

import { createLogger } from '../logger.ts';
import type { ColumnRegistry } from './registry.ts';
import type { ListingQuery } from './types.ts';

const log = createLogger('list-columns');

/**
 * When the primary list query sorts by a registered attribute column, replaces
 * the sort key with the column's sort directive and compares on the column key.
 *
 * @returns whether the query was rewritten
 */
export function rewriteSort(registry: ColumnRegistry, query: ListingQuery): boolean {
  if (!registry.owns(query) || !query.sort_key) {
    return false;
  }

  const column = registry.get(query.sort_key);
  if (!column || column.type !== 'attribute') {
    return false;
  }

  query.sort_key = column.orderable_key;
  query.attribute_key = column.key;

  log.debug('Rewrote attribute sort', { content_type: query.content_type, column_key: column.key, sort_key: column.orderable_key });
  return true;
}
