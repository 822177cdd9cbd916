/**
 * Cell rendering for registered columns.
 *
 * Values are read through the collaborators on every call; nothing is cached here.
 */

import { dimensionStyles, escapeHtml, imageTag } from './markup.ts';
import type { ColumnRegistry } from './registry.ts';
import type { CellCollaborators, CellOutput, ColumnSpec, ImageResolver, RowId, ThumbnailColumn } from './types.ts';

/** Size requested for the featured image column */
export const THUMBNAIL_IMAGE_SIZE = 'thumbnail';

export type CellRenderer = (column_key: string, row_id: RowId) => CellOutput;

type ResolvedValue = { kind: 'markup'; html: string } | { kind: 'value'; value: unknown };

const NUMERIC_PATTERN = /^\s*\d+(\.\d+)?\s*$/;

/**
 * Whether a stored value can be used as an attachment id: a non-negative
 * integral number or numeric string (`"12"`, `"12.0"`).
 */
export function isAttachmentId(value: unknown): boolean {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0;
  }
  return typeof value === 'string' && NUMERIC_PATTERN.test(value) && Number.isInteger(Number(value));
}

/**
 * Plain-text cell output for an untransformed value.
 */
export function cellText(value: unknown): string {
  if (typeof value === 'string') {
    return escapeHtml(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return '';
}

function renderThumbnail(column: ThumbnailColumn, row_id: RowId, images: ImageResolver | undefined): CellOutput {
  const src = images?.thumbnailUrl(row_id, THUMBNAIL_IMAGE_SIZE);
  if (!src) {
    return null;
  }
  return imageTag(src, dimensionStyles(column));
}

function resolveValue(column: Exclude<ColumnSpec, ThumbnailColumn>, row_id: RowId, collaborators: CellCollaborators): ResolvedValue {
  switch (column.type) {
    case 'external-field':
      return { kind: 'value', value: collaborators.fields?.get(row_id, column.key) ?? '' };
    case 'attribute':
      return { kind: 'value', value: collaborators.attributes.get(row_id, column.key) ?? '' };
    case 'computed':
      return { kind: 'value', value: '' };
    case 'image': {
      const value = collaborators.attributes.get(row_id, column.key) ?? '';
      if (isAttachmentId(value) && collaborators.images) {
        const src = collaborators.images.attachmentUrl(Number(value), column.image_size);
        if (src) {
          return { kind: 'markup', html: imageTag(src, `max-width:100%;${dimensionStyles(column)}`) };
        }
      }
      // Unresolvable attachments render as plain attribute values
      return { kind: 'value', value };
    }
  }
}

/**
 * Creates the renderer for one registry.
 *
 * Unregistered and removed keys render null so other renderers can handle them.
 */
export function createCellRenderer(registry: ColumnRegistry, collaborators: CellCollaborators): CellRenderer {
  return (column_key, row_id) => {
    const column = registry.get(column_key);
    if (!column) {
      return null;
    }

    if (column.type === 'thumbnail') {
      return renderThumbnail(column, row_id, collaborators.images);
    }

    const resolved = resolveValue(column, row_id, collaborators);
    if (resolved.kind === 'markup') {
      return resolved.html;
    }

    const transform = column.transform;
    if (typeof transform === 'function') {
      return String(transform(resolved.value, row_id));
    }
    return cellText(resolved.value);
  };
}
