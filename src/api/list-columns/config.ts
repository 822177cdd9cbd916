/**
 * Column declaration configuration.
 *
 * Declarations can be supplied in code or loaded from a JSON file shaped as
 * `{ [content_type]: { [column_key]: declaration | false | "removed" } }`.
 * JSON declarations cannot carry transforms.
 *
 * Environment:
 *   LIST_COLUMNS_CONFIG_FILE - path of the declaration file (optional)
 */

import { readFileSync } from 'node:fs';
import { createLogger } from '../logger.ts';
import { ConfigurationError } from './errors.ts';
import { escapeHtml } from './markup.ts';
import { buildColumnRegistry, type BuildRegistryOptions, type ColumnRegistry } from './registry.ts';
import { DeclarationFileSchema, formatIssues, type DeclarationFile } from './schema.ts';
import type { ListingRow } from './store.ts';
import type { CellOutput, ColumnTitles, SortableColumns } from './types.ts';

const log = createLogger('list-columns');

/** Page size when the request does not ask for one */
export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;

/** Columns the default content listing contributes before the registry applies */
export const DEFAULT_BASE_COLUMNS: ReadonlyMap<string, string> = new Map([
  ['title', 'Title'],
  ['date', 'Date'],
]);

/** Sortable columns of the default content listing */
export const DEFAULT_BASE_SORTABLE: ReadonlyMap<string, string> = new Map([
  ['title', 'title'],
  ['date', 'date'],
]);

/** Fresh copies of the default base mappings */
export function defaultBaseColumns(): { columns: ColumnTitles; sortable: SortableColumns } {
  return { columns: new Map(DEFAULT_BASE_COLUMNS), sortable: new Map(DEFAULT_BASE_SORTABLE) };
}

/** Renders a base column cell from the listed item's own fields */
export type BaseCellRenderer = (column_key: string, row: ListingRow) => CellOutput;

/**
 * Cells of the default listing's `title` and `date` columns.
 */
export function defaultBaseCell(column_key: string, row: ListingRow): CellOutput {
  switch (column_key) {
    case 'title':
      return escapeHtml(row.title);
    case 'date':
      return row.created_at.toISOString();
    default:
      return null;
  }
}

/**
 * Validates the parsed contents of a declaration file.
 *
 * @throws ConfigurationError when the shape is wrong
 */
export function parseDeclarationFile(data: unknown): DeclarationFile {
  const parsed = DeclarationFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid column declaration file: ${issues.join('; ')}`, { issues, cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Builds one registry per content type in a declaration file.
 *
 * @throws ConfigurationError for a malformed file or column
 */
export function registriesFromDeclarations(file: DeclarationFile, options: BuildRegistryOptions = {}): Map<string, ColumnRegistry> {
  const registries = new Map<string, ColumnRegistry>();
  for (const [content_type, declarations] of Object.entries(file)) {
    registries.set(content_type, buildColumnRegistry(content_type, declarations, options));
  }
  return registries;
}

/**
 * Reads and builds the registries in a JSON declaration file.
 *
 * @throws ConfigurationError when the file cannot be read, parsed or validated
 */
export function loadDeclarationFile(path: string, options: BuildRegistryOptions = {}): Map<string, ColumnRegistry> {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read column declaration file ${path}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }

  const registries = registriesFromDeclarations(parseDeclarationFile(data), options);
  log.info('Loaded column declarations', { path, content_types: [...registries.keys()] });
  return registries;
}

/**
 * Loads registries from LIST_COLUMNS_CONFIG_FILE; no file configured means no registries.
 */
export function loadRegistriesFromEnv(options: BuildRegistryOptions = {}): Map<string, ColumnRegistry> {
  const path = process.env.LIST_COLUMNS_CONFIG_FILE;
  if (!path || !path.trim()) {
    log.warn('LIST_COLUMNS_CONFIG_FILE is not set; no list columns configured');
    return new Map();
  }
  return loadDeclarationFile(path.trim(), options);
}
