/**
 * @fileoverview Valibot conversion rules for repobind.
 */

import type * as v from "valibot";
import { standard } from "./standard";
import type { Converter, TypeToken } from "./types";

/**
 * Creates a conversion rule from a Valibot schema.
 *
 * @param sourceType - Token of the accepted source type
 * @param targetType - Token of the produced type
 * @param schema - Valibot schema (sync or async) validating the source value
 * and transforming it into the target type
 *
 * @remarks
 * Valibot implements Standard Schema V1, so this is {@link standard} with the
 * parameter types narrowed to Valibot schemas.
 *
 * @example
 * ```typescript
 * import { valibot, v } from 'repobind/valibot';
 *
 * conversionService.addConverter(
 *   valibot(
 *     Types.string,
 *     Types.number,
 *     v.pipe(v.string(), v.trim(), v.digits(), v.transform(Number)),
 *   ),
 * );
 * ```
 *
 * @see {@link standard} for the underlying rule
 */
export function valibot<$$Source, $$Target>(
  sourceType: TypeToken<$$Source>,
  targetType: TypeToken<$$Target>,
  schema:
    | v.GenericSchema<unknown, $$Target | null>
    | v.GenericSchemaAsync<unknown, $$Target | null>,
  options?: {
    name?: string;
  },
): Converter {
  return standard(sourceType, targetType, schema, options);
}

export * as v from "valibot";
