/**
 * Per-request state shared by the query rewriters and the listing store.
 *
 * One instance is created for each incoming list request. Nothing in here may
 * be shared across requests.
 */

import type { AttributeSqlFilter, AttributeSqlFragment, SqlParams } from './types.ts';

export class RequestState {
  private searchLabelOverride: string | null = null;
  private readonly attributeSqlFilters: AttributeSqlFilter[] = [];
  private readonly counters = new Map<string, number>();

  /** Re-presents a search term to the UI after it was cleared from the query */
  overrideSearchLabel(term: string): void {
    this.searchLabelOverride = term;
  }

  /** The search term the UI should display */
  searchLabel(current: string): string {
    return this.searchLabelOverride ?? current;
  }

  addAttributeSqlFilter(filter: AttributeSqlFilter): void {
    this.attributeSqlFilters.push(filter);
  }

  /**
   * Runs the registered filters over a generated attribute fragment.
   * Called by the store each time it generates attribute SQL.
   */
  filterAttributeSql(fragment: AttributeSqlFragment, params: SqlParams): AttributeSqlFragment {
    return this.attributeSqlFilters.reduce((current, filter) => filter(current, params), fragment);
  }

  /** Increments a named counter and returns its previous value */
  increment(name: string): number {
    const previous = this.counters.get(name) ?? 0;
    this.counters.set(name, previous + 1);
    return previous;
  }
}

export function createRequestState(): RequestState {
  return new RequestState();
}
