/**
 * @fileoverview Zod conversion rules for repobind.
 */

import type { z } from "zod";
import { standard } from "./standard";
import type { Converter, TypeToken } from "./types";

/**
 * Creates a conversion rule from a Zod schema.
 *
 * @param sourceType - Token of the accepted source type
 * @param targetType - Token of the produced type
 * @param schema - Zod schema validating the source value and transforming it
 * into the target type. Zod natively implements Standard Schema V1.
 *
 * @example
 * ```typescript
 * import { zod, z } from 'repobind/zod';
 *
 * conversionService.addConverter(
 *   zod(Types.string, Types.number, z.string().regex(/^\d+$/).transform(Number)),
 * );
 * ```
 */
export function zod<$$Source, $$Target>(
  sourceType: TypeToken<$$Source>,
  targetType: TypeToken<$$Target>,
  schema: z.ZodType<$$Target | null, z.ZodTypeDef, unknown>,
  options?: {
    name?: string;
  },
): Converter {
  return standard(sourceType, targetType, schema, options);
}

export { z } from "zod";
