/**
 * Content list REST route.
 *
 * Exports a Fastify plugin that registers GET /api/content/:content_type/list.
 * Each request gets its own RequestState; registries are shared read-only.
 */

import type { FastifyInstance } from 'fastify';
import type { Pool } from 'pg';
import { z } from 'zod';

import { createLogger } from '../logger.ts';
import { DEFAULT_LIMIT, MAX_LIMIT, defaultBaseCell, defaultBaseColumns, type BaseCellRenderer } from './config.ts';
import { createListView, prepareListingQuery } from './list-view.ts';
import type { ColumnRegistry } from './registry.ts';
import { createRequestState } from './request-state.ts';
import { formatIssues } from './schema.ts';
import { executeListingQuery, loadAttributeStore, storedAttributeKeys } from './store.ts';
import type { CellOutput, ColumnTitles, FieldProvider, ImageResolver, ListingQuery, SortableColumns } from './types.ts';

const log = createLogger('list-columns');

// ---------- types ----------

/** Route params */
interface ContentTypeParams {
  content_type: string;
}

/** Raw list query parameters */
interface ListQuerystring {
  orderby?: string;
  order?: string;
  s?: string;
  limit?: string;
  offset?: string;
}

/** One column of the list response */
export interface ListColumnResponse {
  key: string;
  title: string;
  sort_id: string | null;
}

export interface ListResponse {
  columns: ListColumnResponse[];
  rows: Array<{ id: string; cells: Record<string, CellOutput> }>;
  total: number;
  limit: number;
  offset: number;
  search_label: string;
}

// ---------- validation ----------

const ListQuerySchema = z.object({
  orderby: z.string().optional(),
  order: z.preprocess((value) => (typeof value === 'string' ? value.toLowerCase() : value), z.enum(['asc', 'desc'])).optional(),
  s: z.string().optional(),
  limit: z.coerce.number().int().min(1).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

// ---------- plugin ----------

export interface ListColumnsRoutesOptions {
  pool: Pool;
  /** Registries keyed by content type */
  registries: ReadonlyMap<string, ColumnRegistry>;
  fields?: FieldProvider;
  images?: ImageResolver;
  /** Columns the host listing contributes for a content type */
  baseColumns?: (content_type: string) => { columns: ColumnTitles; sortable: SortableColumns };
  /** Renders the base column cells the registry leaves null */
  baseCell?: BaseCellRenderer;
}

/**
 * Fastify plugin that registers the content list route.
 *
 * Usage:
 * ```ts
 * app.register(listColumnsRoutesPlugin, { pool, registries });
 * ```
 */
export async function listColumnsRoutesPlugin(app: FastifyInstance, opts: ListColumnsRoutesOptions): Promise<void> {
  const { pool, registries, fields, images } = opts;
  const baseColumns = opts.baseColumns ?? defaultBaseColumns;
  const baseCell = opts.baseCell ?? defaultBaseCell;

  // GET /api/content/:content_type/list — list view for one content type
  app.get<{ Params: ContentTypeParams; Querystring: ListQuerystring }>('/api/content/:content_type/list', async (req, reply) => {
    const { content_type } = req.params;
    const registry = registries.get(content_type);
    if (!registry) {
      return reply.code(404).send({ error: 'Unknown content type' });
    }

    const parsed = ListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: formatIssues(parsed.error).join('; ') });
    }
    const params = parsed.data;

    const state = createRequestState();
    const query: ListingQuery = {
      content_type,
      is_primary: true,
      sort_key: params.orderby ?? '',
      sort_direction: params.order ?? 'desc',
      search_term: params.s ?? '',
      attribute_key: null,
      attribute_filters: null,
      limit: Math.min(params.limit ?? DEFAULT_LIMIT, MAX_LIMIT),
      offset: params.offset ?? 0,
    };

    const prepared = prepareListingQuery(registry, query, state);
    const result = await executeListingQuery(pool, query, state);
    const attributes = await loadAttributeStore(
      pool,
      result.rows.map((row) => row.id),
      storedAttributeKeys(registry),
    );

    const view = createListView(registry, { attributes, fields, images });
    const base = baseColumns(content_type);
    const columns = view.columns(base.columns);
    const sortable = view.sortable(base.sortable);

    log.debug('Listed content', { content_type, total: result.total, ...prepared });

    const body: ListResponse = {
      columns: [...columns].map(([key, title]) => ({ key, title, sort_id: sortable.get(key) ?? null })),
      rows: result.rows.map((row) => {
        const cells = view.renderRow(row.id, columns.keys());
        for (const key of columns.keys()) {
          if (cells[key] === null) {
            cells[key] = baseCell(key, row);
          }
        }
        return { id: row.id, cells };
      }),
      total: result.total,
      limit: query.limit,
      offset: query.offset,
      search_label: state.searchLabel(query.search_term),
    };
    return reply.send(body);
  });
}
