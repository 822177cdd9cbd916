/**
 * Rewrites a free-text search into attribute matches OR a title match.
 *
 * Once attribute clauses are installed the store's native search path is
 * bypassed, so the title match is spliced back into the generated attribute
 * SQL and the cleared term is re-presented to the UI through the request state.
 */

import { createLogger } from '../logger.ts';
import type { ColumnRegistry } from './registry.ts';
import type { RequestState } from './request-state.ts';
import { ITEM_ALIAS, containsPattern } from './sql.ts';
import type { AttributeFilterGroup, AttributeSqlFilter, ListingQuery } from './types.ts';

const log = createLogger('list-columns');

/** Request-state counter guarding the title splice */
export const TITLE_SPLICE_COUNTER = 'search.title-splice';

/**
 * Builds the attribute SQL filter that ORs a title match into the generated
 * fragment. Only the first invocation per request takes effect.
 */
export function titleSpliceFilter(state: RequestState, term: string): AttributeSqlFilter {
  return (fragment, params) => {
    if (state.increment(TITLE_SPLICE_COUNTER) > 0) {
      return fragment;
    }
    const placeholder = params.add(containsPattern(term));
    return { where: `( ${ITEM_ALIAS}.title ILIKE ${placeholder} OR ${fragment.where} )` };
  };
}

/**
 * Rewrites the primary list query's search term into a disjunction over the
 * searchable attribute columns.
 *
 * With no searchable attribute columns the query is left untouched and the
 * store's default search applies.
 *
 * @returns whether the query was rewritten
 */
export function rewriteSearch(registry: ColumnRegistry, query: ListingQuery, state: RequestState): boolean {
  const term = query.search_term;
  if (!registry.owns(query) || !term) {
    return false;
  }

  const columns = registry.active().filter((column) => column.type === 'attribute' && column.searchable);
  if (columns.length === 0) {
    return false;
  }

  const filters: AttributeFilterGroup = {
    relation: 'OR',
    clauses: columns.map((column) => ({ key: column.key, value: term, compare: 'LIKE' as const })),
  };

  query.attribute_filters = filters;
  query.search_term = '';

  state.overrideSearchLabel(term);
  state.addAttributeSqlFilter(titleSpliceFilter(state, term));

  log.debug('Rewrote search to attribute match', {
    content_type: query.content_type,
    columns: columns.map((column) => column.key),
  });
  return true;
}
