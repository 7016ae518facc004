import type { StandardSchemaV1 } from "@standard-schema/spec";
import { ConversionError } from "./errors";
import type { Converter, TypeToken } from "./types";

/**
 * Creates a conversion rule from a Standard Schema.
 *
 * @typeParam $$Source - The type the rule converts from
 * @typeParam $$Target - The type the rule converts to
 *
 * @param sourceType - Token of the accepted source type
 * @param targetType - Token of the produced type
 * @param schema - A Standard Schema that validates the source value and
 * transforms it into the target type. An output of `null` means "no value".
 *
 * @returns A rule that matches exactly the (`sourceType`, `targetType`) pair
 *
 * @remarks
 * Any library implementing the Standard Schema specification
 * (https://standardschema.dev) works here. Async schemas are awaited.
 * Validation issues are reported as a {@link ConversionError} listing every
 * issue message.
 *
 * @example
 * ```typescript
 * import { standard } from 'repobind/standard';
 * import * as v from 'valibot';
 *
 * const OrderNumber = defineType("OrderNumber", isOrderNumber);
 *
 * conversionService.addConverter(
 *   standard(
 *     Types.string,
 *     OrderNumber,
 *     v.pipe(v.string(), v.regex(/^ORD-\d+$/), v.transform(toOrderNumber)),
 *   ),
 * );
 * ```
 *
 * @see {@link https://standardschema.dev} for Standard Schema specification
 */
export function standard<$$Source, $$Target>(
  sourceType: TypeToken<$$Source>,
  targetType: TypeToken<$$Target>,
  schema: StandardSchemaV1<unknown, $$Target | null>,
  options?: {
    name?: string;
  },
): Converter {
  const name =
    options?.name ??
    `${schema["~standard"].vendor}(${sourceType.name} -> ${targetType.name})`;

  return {
    name,
    matches(_sourceType, _targetType) {
      return _sourceType === sourceType && _targetType === targetType;
    },
    async convert(value) {
      const result = await schema["~standard"].validate(value);

      if (result.issues) {
        const messages = result.issues.map((issue) => issue.message).join("; ");
        throw new ConversionError(
          sourceType.name,
          targetType.name,
          `Failed to convert from type "${sourceType.name}" to type "${targetType.name}": ${messages}`,
        );
      }

      return result.value;
    },
  };
}
