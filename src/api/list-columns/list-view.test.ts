import { describe, it, expect } from 'vitest';
import { buildColumnRegistry } from './registry.ts';
import { createListView } from './list-view.ts';
import { createRequestState } from './request-state.ts';
import type { AttributeStore, ListingQuery } from './types.ts';

const values: Record<string, Record<string, string>> = { 'row-1': { sku: 'AB12', price: '10' } };

const attributes: AttributeStore = {
  get: (row_id, key) => values[row_id]?.[key],
};

function makeQuery(overrides: Partial<ListingQuery> = {}): ListingQuery {
  return {
    content_type: 'product',
    is_primary: true,
    sort_key: '',
    sort_direction: 'desc',
    search_term: '',
    attribute_key: null,
    attribute_filters: null,
    limit: 20,
    offset: 0,
    ...overrides,
  };
}

describe('createListView', () => {
  const view = createListView(
    buildColumnRegistry('product', {
      sku: { title: 'SKU', sortable: true, searchable: true },
      price: { title: 'Price', transform: (value) => `$${String(value)}` },
      date: false,
    }),
    { attributes },
  );

  it('prepares the query with both rewriters', () => {
    const state = createRequestState();
    const query = makeQuery({ sort_key: 'sku', search_term: 'AB' });

    expect(view.prepareQuery(query, state)).toEqual({ sort_rewritten: true, search_rewritten: true });
    expect(query.sort_key).toBe('attribute_value');
    expect(query.attribute_key).toBe('sku');
    expect(query.search_term).toBe('');
    expect(state.searchLabel(query.search_term)).toBe('AB');
  });

  it('renders a row for the visible columns', () => {
    const columns = view.columns(new Map([['title', 'Title'], ['date', 'Date']]));

    expect([...columns.keys()]).toEqual(['title', 'sku', 'price']);
    expect(view.renderRow('row-1', columns.keys())).toEqual({ title: null, sku: 'AB12', price: '$10' });
  });

  it('renders a registered column the same regardless of unrelated columns', () => {
    const alone = createListView(buildColumnRegistry('product', { sku: { title: 'SKU' } }), { attributes });

    expect(alone.renderRow('row-1', ['sku'])).toEqual(view.renderRow('row-1', ['sku']));
    expect(alone.sortable(new Map()).has('sku')).toBe(false);
    expect(view.sortable(new Map()).get('sku')).toBe('sku');
  });
});
