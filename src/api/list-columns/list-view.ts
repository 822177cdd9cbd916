/**
 * Binds a column registry to its collaborators for one content type's list view.
 */

import { sortableColumns, visibleColumns } from './projection.ts';
import type { ColumnRegistry } from './registry.ts';
import { createCellRenderer } from './render.ts';
import type { RequestState } from './request-state.ts';
import { rewriteSearch } from './search.ts';
import { rewriteSort } from './sort.ts';
import type { CellCollaborators, CellOutput, ColumnTitles, ListingQuery, RowId, SortableColumns } from './types.ts';

/** Which rewrites a prepared query went through */
export interface PreparedQuery {
  sort_rewritten: boolean;
  search_rewritten: boolean;
}

export interface ListView {
  readonly registry: ColumnRegistry;
  columns(base: ColumnTitles): ColumnTitles;
  sortable(base: SortableColumns): SortableColumns;
  /** Rewrites the outgoing query in place before it is executed */
  prepareQuery(query: ListingQuery, state: RequestState): PreparedQuery;
  /** Renders one row; keys not handled by the registry map to null */
  renderRow(row_id: RowId, column_keys: Iterable<string>): Record<string, CellOutput>;
}

/**
 * Runs the sort and search rewriters over an outgoing query.
 */
export function prepareListingQuery(registry: ColumnRegistry, query: ListingQuery, state: RequestState): PreparedQuery {
  return {
    sort_rewritten: rewriteSort(registry, query),
    search_rewritten: rewriteSearch(registry, query, state),
  };
}

export function createListView(registry: ColumnRegistry, collaborators: CellCollaborators): ListView {
  const render = createCellRenderer(registry, collaborators);

  return {
    registry,
    columns: (base) => visibleColumns(registry, base),
    sortable: (base) => sortableColumns(registry, base),
    prepareQuery: (query, state) => prepareListingQuery(registry, query, state),
    renderRow(row_id, column_keys) {
      const cells: Record<string, CellOutput> = {};
      for (const key of column_keys) {
        cells[key] = render(key, row_id);
      }
      return cells;
    },
  };
}
