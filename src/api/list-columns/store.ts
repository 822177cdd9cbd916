/**
 * Postgres listing store for content items with key/value attributes.
 *
 * Tables:
 *   content_item(id uuid, content_type text, title text, content text, created_at timestamptz, deleted_at timestamptz)
 *   content_attribute(item_id uuid, key text, value text)
 */

import type { Pool } from 'pg';
import type { ColumnRegistry } from './registry.ts';
import type { RequestState } from './request-state.ts';
import { ITEM_ALIAS as I, containsPattern, createSqlParams } from './sql.ts';
import type { AttributeFilterGroup, AttributeSqlFragment, AttributeStore, ListingQuery, RowId, SqlParams } from './types.ts';

/** Generated statements for one listing query */
export interface ListingSql {
  text: string;
  params: unknown[];
  count_text: string;
  count_params: unknown[];
}

/** One row of a listing page with the item's own fields */
export interface ListingRow {
  id: RowId;
  title: string;
  created_at: Date;
}

export interface ListingResult {
  rows: ListingRow[];
  total: number;
}

const NUMERIC_VALUE_PATTERN = '^-?[0-9]+(\\.[0-9]+)?$';

/**
 * EXISTS disjunction for the attribute filters, before request filters run.
 */
export function attributeFilterSql(filters: AttributeFilterGroup, params: SqlParams): AttributeSqlFragment {
  const clauses = filters.clauses.map((clause, index) => {
    const alias = `a${index + 1}`;
    const key = params.add(clause.key);
    const pattern = params.add(containsPattern(clause.value));
    return `EXISTS (SELECT 1 FROM content_attribute ${alias} WHERE ${alias}.item_id = ${I}.id AND ${alias}.key = ${key} AND ${alias}.value ILIKE ${pattern})`;
  });
  return { where: `(${clauses.join(' OR ')})` };
}

function sortSql(query: ListingQuery, params: SqlParams): { join: string; order_by: string } {
  const direction = query.sort_direction === 'asc' ? 'ASC' : 'DESC';

  switch (query.sort_key) {
    case 'title':
      return { join: '', order_by: `${I}.title ${direction}, ${I}.id ASC` };
    case 'attribute_value':
    case 'attribute_value_num': {
      if (!query.attribute_key) break;
      const key = params.add(query.attribute_key);
      const join = ` LEFT JOIN LATERAL (SELECT sa.value FROM content_attribute sa WHERE sa.item_id = ${I}.id AND sa.key = ${key} ORDER BY sa.value LIMIT 1) s ON true`;
      const expression = query.sort_key === 'attribute_value_num' ? `CASE WHEN s.value ~ '${NUMERIC_VALUE_PATTERN}' THEN s.value::numeric END` : 's.value';
      return { join, order_by: `${expression} ${direction} NULLS LAST, ${I}.id ASC` };
    }
  }

  // 'date', empty and unknown sort keys
  return { join: '', order_by: `${I}.created_at ${direction}, ${I}.id ASC` };
}

/**
 * Builds the page and count statements for a listing query.
 *
 * The attribute fragment goes through the request's attribute SQL filters
 * once per call.
 */
export function buildListingSql(query: ListingQuery, state: RequestState): ListingSql {
  const params = createSqlParams();
  const conditions: string[] = [`${I}.content_type = ${params.add(query.content_type)}`, `${I}.deleted_at IS NULL`];

  if (query.search_term) {
    const pattern = params.add(containsPattern(query.search_term));
    conditions.push(`(${I}.title ILIKE ${pattern} OR ${I}.content ILIKE ${pattern})`);
  }

  if (query.attribute_filters && query.attribute_filters.clauses.length > 0) {
    const fragment = state.filterAttributeSql(attributeFilterSql(query.attribute_filters, params), params);
    conditions.push(fragment.where);
  }

  const whereClause = `WHERE ${conditions.join(' AND ')}`;
  const count_params = [...params.values];

  const { join, order_by } = sortSql(query, params);
  const limit = params.add(query.limit);
  const offset = params.add(query.offset);

  return {
    text: `SELECT ${I}.id::text AS id, ${I}.title, ${I}.created_at FROM content_item ${I}${join} ${whereClause} ORDER BY ${order_by} LIMIT ${limit} OFFSET ${offset}`,
    params: params.values,
    count_text: `SELECT COUNT(*) AS total FROM content_item ${I} ${whereClause}`,
    count_params,
  };
}

/**
 * Runs a prepared listing query and returns the page of rows with the total.
 */
export async function executeListingQuery(pool: Pool, query: ListingQuery, state: RequestState): Promise<ListingResult> {
  const sql = buildListingSql(query, state);

  const [rowsResult, countResult] = await Promise.all([
    pool.query<ListingRow>(sql.text, sql.params),
    pool.query<{ total: string }>(sql.count_text, sql.count_params),
  ]);

  return {
    rows: rowsResult.rows,
    total: parseInt(countResult.rows[0]?.total ?? '0', 10),
  };
}

/** Attribute keys the renderer reads from the attribute store */
export function storedAttributeKeys(registry: ColumnRegistry): string[] {
  return registry
    .active()
    .filter((column) => column.type === 'attribute' || column.type === 'image')
    .map((column) => column.key);
}

/**
 * Loads the attributes of one page of rows into a synchronous store.
 * Values are ordered like the sort join, so the lowest value per row and key
 * is the one displayed and sorted on.
 */
export async function loadAttributeStore(pool: Pool, row_ids: RowId[], keys: string[]): Promise<AttributeStore> {
  const values = new Map<RowId, Map<string, string>>();

  if (row_ids.length > 0 && keys.length > 0) {
    const result = await pool.query<{ item_id: string; key: string; value: string | null }>(
      `SELECT item_id::text AS item_id, key, value
       FROM content_attribute
       WHERE item_id = ANY($1::uuid[]) AND key = ANY($2::text[])
       ORDER BY item_id, key, value`,
      [row_ids, keys],
    );

    for (const row of result.rows) {
      let byKey = values.get(row.item_id);
      if (!byKey) {
        byKey = new Map();
        values.set(row.item_id, byKey);
      }
      if (!byKey.has(row.key) && row.value !== null) {
        byKey.set(row.key, row.value);
      }
    }
  }

  return {
    get: (row_id, key) => values.get(row_id)?.get(key),
  };
}
