/**
 * Column registry: normalizes raw column declarations for one content type.
 *
 * Built once per content type and frozen; request handling only reads it.
 */

import { createLogger } from '../logger.ts';
import { ConfigurationError } from './errors.ts';
import { RawColumnDeclarationSchema, RemovedSentinelSchema, formatIssues, type ParsedColumnDeclaration } from './schema.ts';
import type { ColumnEntry, ColumnSpec, ColumnType, ListingQuery, RawColumnDeclarations } from './types.ts';

const log = createLogger('list-columns');

/** Reserved key for the featured image column */
export const THUMBNAIL_KEY = 'thumbnail';

/** Default sort directive for attribute columns */
export const DEFAULT_ORDERABLE_KEY = 'attribute_value';

export const DEFAULT_IMAGE_SIZE = 'thumbnail';

const THUMBNAIL_DEFAULT_SIZE = 80;

export interface BuildRegistryOptions {
  /** Translates built-in titles (i18n collaborator) */
  translate?: (text: string) => string;
}

/**
 * Read-only mapping from column key to entry.
 */
export class ColumnRegistry {
  readonly content_type: string;
  private readonly columns: ReadonlyMap<string, ColumnEntry>;

  constructor(content_type: string, columns: Map<string, ColumnEntry>) {
    this.content_type = content_type;
    this.columns = columns;
    Object.freeze(this);
  }

  /** All entries in declaration order */
  entries(): ColumnEntry[] {
    return [...this.columns.values()];
  }

  /** Active column spec for a key, or undefined when unregistered or removed */
  get(key: string): ColumnSpec | undefined {
    const entry = this.columns.get(key);
    return entry?.kind === 'active' ? entry.spec : undefined;
  }

  isRemoved(key: string): boolean {
    return this.columns.get(key)?.kind === 'removed';
  }

  /** Active column specs in declaration order */
  active(): ColumnSpec[] {
    const specs: ColumnSpec[] = [];
    for (const entry of this.columns.values()) {
      if (entry.kind === 'active') specs.push(entry.spec);
    }
    return specs;
  }

  /** Whether a query is the primary list view of this registry's content type */
  owns(query: ListingQuery): boolean {
    return query.is_primary && query.content_type === this.content_type;
  }
}

function canonicalType(declared: NonNullable<ParsedColumnDeclaration['type']>): ColumnType {
  switch (declared) {
    case 'meta':
      return 'attribute';
    case 'acf':
      return 'external-field';
    default:
      return declared;
  }
}

function resolveType(key: string, declared: ParsedColumnDeclaration['type']): ColumnType {
  const type = declared ? canonicalType(declared) : 'attribute';
  if (key !== THUMBNAIL_KEY) {
    return type;
  }
  if (declared && type !== 'thumbnail') {
    log.warn('Ignoring declared type on the reserved thumbnail column', { column_key: key, type: declared });
  }
  return 'thumbnail';
}

type SpecBase = Omit<ColumnSpec, 'type' | 'width' | 'height' | 'image_size'>;

function buildSpec(type: ColumnType, base: SpecBase, decl: ParsedColumnDeclaration, isThumbnailKey: boolean): ColumnSpec {
  switch (type) {
    case 'thumbnail':
      return {
        ...base,
        type,
        width: decl.width ?? (isThumbnailKey ? THUMBNAIL_DEFAULT_SIZE : undefined),
        height: decl.height ?? (isThumbnailKey ? THUMBNAIL_DEFAULT_SIZE : undefined),
      };
    case 'image':
      return {
        ...base,
        type,
        image_size: decl.image_size ?? DEFAULT_IMAGE_SIZE,
        width: decl.width,
        height: decl.height,
      };
    case 'attribute':
    case 'computed':
    case 'external-field':
      return { ...base, type };
  }
}

function normalizeColumn(key: string, raw: unknown, translate: (text: string) => string): ColumnEntry {
  if (RemovedSentinelSchema.safeParse(raw).success) {
    return { kind: 'removed', key };
  }

  const parsed = RawColumnDeclarationSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid column declaration for "${key}": ${issues.join('; ')}`, {
      column_key: key,
      issues,
      cause: parsed.error,
    });
  }

  const decl = parsed.data;
  const isThumbnailKey = key === THUMBNAIL_KEY;
  const base: SpecBase = {
    key,
    title: decl.title ?? (isThumbnailKey ? translate('Featured Image') : ''),
    sortable: decl.sortable ?? false,
    orderable_key: decl.orderable_key ?? decl.orderby ?? DEFAULT_ORDERABLE_KEY,
    searchable: decl.searchable ?? false,
    transform: decl.transform ?? null,
  };

  return { kind: 'active', spec: Object.freeze(buildSpec(resolveType(key, decl.type), base, decl, isThumbnailKey)) };
}

/**
 * Builds the registry for a content type.
 * Unchecked input (e.g. parsed JSON) is accepted and validated per column.
 * The typed overload gives inline transforms their parameter types.
 *
 * @throws ConfigurationError naming the first malformed column; no partial registry is returned
 */
export function buildColumnRegistry(content_type: string, declarations: RawColumnDeclarations, options?: BuildRegistryOptions): ColumnRegistry;
export function buildColumnRegistry(content_type: string, declarations: Record<string, unknown>, options?: BuildRegistryOptions): ColumnRegistry;
export function buildColumnRegistry(
  content_type: string,
  declarations: Record<string, unknown>,
  options: BuildRegistryOptions = {},
): ColumnRegistry {
  const translate = options.translate ?? ((text: string) => text);
  const columns = new Map<string, ColumnEntry>();

  for (const [key, raw] of Object.entries(declarations)) {
    columns.set(key, normalizeColumn(key, raw, translate));
  }

  const registry = new ColumnRegistry(content_type, columns);
  log.debug('Built column registry', {
    content_type,
    active: registry.active().length,
    removed: columns.size - registry.active().length,
  });
  return registry;
}
