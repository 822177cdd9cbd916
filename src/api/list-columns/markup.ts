/**
 * Markup helpers for rendered cells.
 */

import type { Dimension } from './types.ts';

/**
 * Escape HTML special characters for text and attribute values.
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;').replace(/'/g, '&#39;');
}

/**
 * Inline `width:…px;height:…px;` rules for the dimensions that are present.
 */
export function dimensionStyles(dimensions: { width?: Dimension; height?: Dimension }): string {
  let styles = '';
  for (const attr of ['width', 'height'] as const) {
    const value = dimensions[attr];
    if (value !== undefined) {
      styles += `${attr}:${escapeHtml(String(value))}px;`;
    }
  }
  return styles;
}

/**
 * `<img>` tag; the style attribute is omitted when there are no rules.
 * Callers pass styles already built from escaped values.
 */
export function imageTag(src: string, styles: string): string {
  const style = styles ? ` style="${styles}"` : '';
  return `<img src="${escapeHtml(src)}"${style}>`;
}
