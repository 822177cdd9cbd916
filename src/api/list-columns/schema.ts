/**
 * Zod schemas for raw column declarations.
 *
 * Unknown properties are stripped. Legacy names (`meta`, `acf`, `orderby`) are
 * accepted here and mapped onto the current names by the registry.
 */

import { z } from 'zod';
import type { CellTransform } from './types.ts';

export const RemovedSentinelSchema = z.union([z.literal(false), z.literal('removed')]);

export const ColumnTypeSchema = z.enum(['attribute', 'computed', 'external-field', 'image', 'thumbnail', 'meta', 'acf']);

const DimensionSchema = z.union([z.number().nonnegative(), z.string().min(1)]);

const TransformSchema = z.custom<CellTransform>((value) => typeof value === 'function', {
  message: 'transform must be a function',
});

export const RawColumnDeclarationSchema = z.object({
  title: z.string().optional(),
  type: ColumnTypeSchema.optional(),
  sortable: z.boolean().optional(),
  orderable_key: z.string().min(1).optional(),
  orderby: z.string().min(1).optional(),
  searchable: z.boolean().optional(),
  transform: TransformSchema.nullable().optional(),
  width: DimensionSchema.optional(),
  height: DimensionSchema.optional(),
  image_size: z.string().min(1).optional(),
});

export type ParsedColumnDeclaration = z.infer<typeof RawColumnDeclarationSchema>;

/** `{ [content_type]: { [column_key]: declaration | false | "removed" } }` */
export const DeclarationFileSchema = z.record(z.string().min(1), z.record(z.string().min(1), z.unknown()));

export type DeclarationFile = z.infer<typeof DeclarationFileSchema>;

/**
 * Flattens zod issues into `path: message` strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
