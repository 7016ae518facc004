import type { Converter, TypeToken } from "./types";

/**
 * Defines a rule for one fixed pair of types.
 *
 * @example
 * ```typescript
 * const cents = defineConverter(Types.string, Cents, (value) =>
 *   Math.round(Number.parseFloat(value) * 100),
 * );
 *
 * conversionService.addConverter(cents);
 * ```
 */
export function defineConverter<$$Source, $$Target>(
  sourceType: TypeToken<$$Source>,
  targetType: TypeToken<$$Target>,
  fn: (value: $$Source) => $$Target | Promise<$$Target>,
  options?: {
    name?: string;
  },
): Converter {
  return {
    name: options?.name ?? `${sourceType.name} -> ${targetType.name}`,
    matches(_sourceType, _targetType) {
      return _sourceType === sourceType && _targetType === targetType;
    },
    convert(value, _sourceType, _targetType) {
      if (!sourceType.is(value)) {
        throw new TypeError(`Expected a value of type "${sourceType.name}"`);
      }

      return fn(value);
    },
  };
}
