/**
 * Types for admin list-view column configuration.
 *
 * All property names use snake_case to match the project-wide convention.
 */

/** Opaque identifier of a listed row (content item id) */
export type RowId = string;

/** Supported column sources */
export type ColumnType = 'attribute' | 'computed' | 'external-field' | 'image' | 'thumbnail';

/** Sort directives understood by the listing store for attribute columns */
export type AttributeSortDirective = 'attribute_value' | 'attribute_value_num';

/** Pixel dimension; numbers and strings are both interpolated into inline styles */
export type Dimension = number | string;

/** Value produced for a cell */
export type Renderable = string | number;

/** Caller-supplied cell transform */
export type CellTransform = (value: unknown, row_id: RowId) => Renderable;

interface ColumnSpecBase {
  key: string;
  title: string;
  sortable: boolean;
  /** Sort directive for attribute columns; the compared attribute is always the column key */
  orderable_key: string;
  searchable: boolean;
  transform: CellTransform | null;
}

export interface AttributeColumn extends ColumnSpecBase {
  type: 'attribute';
}

export interface ComputedColumn extends ColumnSpecBase {
  type: 'computed';
}

export interface ExternalFieldColumn extends ColumnSpecBase {
  type: 'external-field';
}

export interface ImageColumn extends ColumnSpecBase {
  type: 'image';
  image_size: string;
  width?: Dimension;
  height?: Dimension;
}

export interface ThumbnailColumn extends ColumnSpecBase {
  type: 'thumbnail';
  width?: Dimension;
  height?: Dimension;
}

/** A normalized column declaration */
export type ColumnSpec = AttributeColumn | ComputedColumn | ExternalFieldColumn | ImageColumn | ThumbnailColumn;

/** A registry entry: either an active column or an explicit removal */
export type ColumnEntry = { kind: 'active'; spec: ColumnSpec } | { kind: 'removed'; key: string };

/** Raw per-column input, before normalization */
export interface RawColumnDeclaration {
  title?: string;
  type?: ColumnType | 'meta' | 'acf';
  sortable?: boolean;
  orderable_key?: string;
  /** Legacy name of orderable_key */
  orderby?: string;
  searchable?: boolean;
  transform?: CellTransform | null;
  width?: Dimension;
  height?: Dimension;
  image_size?: string;
}

/** Marker that removes a column from display and sort output */
export type RemovedSentinel = false | 'removed';

/** Registry construction input: column key to declaration or removal marker */
export type RawColumnDeclarations = Record<string, RawColumnDeclaration | RemovedSentinel>;

/** Ordered key → title mapping owned by the host listing */
export type ColumnTitles = Map<string, string>;

/** Ordered key → sort id mapping owned by the host listing */
export type SortableColumns = Map<string, string>;

export type SortDirection = 'asc' | 'desc';

/** One partial-match test against an attribute value */
export interface AttributeClause {
  key: string;
  value: string;
  compare: 'LIKE';
}

/** Disjunction of attribute clauses */
export interface AttributeFilterGroup {
  relation: 'OR';
  clauses: AttributeClause[];
}

/** Outgoing listing request for one content type */
export interface ListingQuery {
  content_type: string;
  /** True only for the canonical admin list query of the content type */
  is_primary: boolean;
  sort_key: string;
  sort_direction: SortDirection;
  search_term: string;
  /** Attribute compared when sorting by an attribute directive */
  attribute_key: string | null;
  attribute_filters: AttributeFilterGroup | null;
  limit: number;
  offset: number;
}

/** Parameterized SQL fragment for the attribute filters of a listing query */
export interface AttributeSqlFragment {
  /** Boolean expression, without a leading AND */
  where: string;
}

/** Accumulates positional parameters for a statement */
export interface SqlParams {
  /** Append a value and return its placeholder, e.g. `$3` */
  add(value: unknown): string;
  readonly values: unknown[];
}

export type AttributeSqlFilter = (fragment: AttributeSqlFragment, params: SqlParams) => AttributeSqlFragment;

/** Direct single-value attribute read */
export interface AttributeStore {
  get(row_id: RowId, key: string): unknown;
}

/** Values owned by an external field plugin */
export interface FieldProvider {
  get(row_id: RowId, key: string): unknown;
}

/** Image URL resolution */
export interface ImageResolver {
  /** URL of the row's featured image at a size, or null */
  thumbnailUrl(row_id: RowId, size: string): string | null;
  /** URL of an attachment at a size, or null */
  attachmentUrl(attachment_id: number, size: string): string | null;
}

export interface CellCollaborators {
  attributes: AttributeStore;
  fields?: FieldProvider;
  images?: ImageResolver;
}

/** Cell output; null means nothing to render for this column */
export type CellOutput = string | null;
