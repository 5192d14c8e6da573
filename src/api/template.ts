import { z } from 'zod';
import { TransformFn } from '../engine/ast';
import { TemplateFormatError } from './errors';

const transformFnSchema = z.custom<TransformFn>(value => typeof value === 'function', {
  message: 'Expected a function.',
});

export const combineSpecSchema = z.strictObject({
  args: z.array(z.string()).default([]),
  func: z.union([z.string(), transformFnSchema]),
});

export const fieldSpecSchema = z.union([
  z.string(),
  transformFnSchema,
  combineSpecSchema,
  z.array(z.unknown()),
  z.number(),
  z.boolean(),
  z.null(),
]);

export const columnDescriptionSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.record(z.string(), fieldSpecSchema),
]);

export const templateSchema = z.record(z.string(), columnDescriptionSchema);

export type CombineSpecInput = z.input<typeof combineSpecSchema>;
export type CombineSpec = z.output<typeof combineSpecSchema>;
export type FieldSpec = z.input<typeof fieldSpecSchema>;
export type ColumnDescription = z.input<typeof columnDescriptionSchema>;

/**
 * A transform template before compilation: input column -> rename target or output fields.
 *
 * @example
 * ```typescript
 * const template: RawTemplate = {
 *   name: 'full_name',
 *   address: { city: 'split($, ", ")[2]', zip: (s: string) => s.slice(-5) },
 *   first: { greeting: combine(['first', 'last'], 'concat($1, " ", $2)') },
 * };
 * ```
 */
export type RawTemplate = z.input<typeof templateSchema>;
export type ValidTemplate = z.output<typeof templateSchema>;

/**
 * Checks the shape of a template document and returns a validated copy.
 */
export function validateTemplate(template: unknown): ValidTemplate {
  const result = templateSchema.safeParse(template);
  if (!result.success) {
    throw new TemplateFormatError(`Invalid template:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function combine(args: string[], func: string | TransformFn): CombineSpec {
  const result = combineSpecSchema.safeParse({ args, func });
  if (!result.success) {
    throw new TemplateFormatError(`Invalid combine spec:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}
