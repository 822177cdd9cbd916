/**
 * Derives the displayed and sortable column sets for a list view.
 *
 * Both functions work on a copy of the host listing's base mapping and keep
 * its order; keys the registry adds are appended in registry order.
 */

import type { ColumnRegistry } from './registry.ts';
import type { ColumnTitles, SortableColumns } from './types.ts';

/**
 * Applies the registry to the host's key → title mapping.
 * Removed columns are dropped (a no-op when absent); active columns are upserted.
 */
export function visibleColumns(registry: ColumnRegistry, base: ColumnTitles): ColumnTitles {
  const columns = new Map(base);

  for (const entry of registry.entries()) {
    if (entry.kind === 'removed') {
      columns.delete(entry.key);
      continue;
    }
    columns.set(entry.spec.key, entry.spec.title);
  }

  return columns;
}

/**
 * Applies the registry to the host's key → sort id mapping.
 *
 * Removed and non-sortable columns are dropped. A sortable column missing from
 * the base is only added for attribute columns, with its own key as sort id;
 * other types must already be sortable in the base.
 */
export function sortableColumns(registry: ColumnRegistry, base: SortableColumns): SortableColumns {
  const columns = new Map(base);

  for (const entry of registry.entries()) {
    const key = entry.kind === 'removed' ? entry.key : entry.spec.key;
    if (entry.kind === 'removed' || !entry.spec.sortable) {
      columns.delete(key);
      continue;
    }
    if (!columns.has(key) && entry.spec.type === 'attribute') {
      columns.set(key, key);
    }
  }

  return columns;
}
