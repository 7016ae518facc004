import { createDefaultConverters } from "./defaultConverters";
import { inferType } from "./defineType";
import { ConversionError, ConverterNotFoundError } from "./errors";
import type { ConversionService, Converter, TypeToken } from "./types";

/**
 * Creates a conversion service.
 *
 * @param args - Service configuration
 * @param args.converters - Additional rules, registered after the defaults
 * @param args.defaults - Install the built-in rules (default: `true`)
 *
 * @returns A conversion service with an open set of rules
 *
 * @remarks
 * The built-in rules cover the usual identifier representations: strings to
 * numbers, bigints, booleans and dates, and numbers, bigints, booleans and
 * dates back to strings. Blank strings convert to `null`.
 *
 * ```
 * convert(value) → null? → already target? → newest matching rule → target guard
 * ```
 *
 * @example
 * ```typescript
 * const conversionService = createConversionService();
 *
 * await conversionService.convert("42", Types.number); // 42
 * await conversionService.convert(" ", Types.number); // null
 * await conversionService.convert("abc", Types.number); // throws ConversionError
 * ```
 */
export function createConversionService(args?: {
  converters?: Converter[];
  defaults?: boolean;
}): ConversionService {
  const converters: Converter[] = [];

  const addConverter = (converter: Converter) => {
    converters.unshift(converter);
  };

  const defaults = args?.defaults === false ? [] : createDefaultConverters();

  for (const converter of defaults) {
    addConverter(converter);
  }
  for (const converter of args?.converters ?? []) {
    addConverter(converter);
  }

  const findConverter = (sourceType: TypeToken, targetType: TypeToken) =>
    converters.find((converter) => converter.matches(sourceType, targetType));

  return {
    addConverter,
    canConvert(sourceType, targetType) {
      if (sourceType === targetType) {
        return true;
      }

      return findConverter(sourceType, targetType) !== undefined;
    },
    async convert(value, targetType, sourceType) {
      // 1. absent values stay absent
      if (value === null || value === undefined) {
        return null;
      }

      // 2. nothing to do
      if (targetType.is(value)) {
        return value;
      }

      // 3. find a rule
      const _sourceType = sourceType ?? inferType(value);
      const converter = findConverter(_sourceType, targetType);

      if (!converter) {
        // same type, but the value itself is not valid for it
        if (_sourceType === targetType) {
          throw new ConversionError(
            _sourceType.name,
            targetType.name,
            `Value is not a valid "${targetType.name}"`,
          );
        }

        throw new ConverterNotFoundError(_sourceType.name, targetType.name);
      }

      // 4. run it
      let result: unknown;
      try {
        result = await converter.convert(value, _sourceType, targetType);
      } catch (error) {
        if (error instanceof ConversionError) {
          throw error;
        }

        throw new ConversionError(
          _sourceType.name,
          targetType.name,
          `Failed to convert from type "${_sourceType.name}" to type "${targetType.name}" using ${converter.name ?? "an anonymous converter"}`,
          { cause: error },
        );
      }

      // 5. check the result
      if (result === null || result === undefined) {
        return null;
      }
      if (!targetType.is(result)) {
        throw new ConversionError(
          _sourceType.name,
          targetType.name,
          `${converter.name ?? "Converter"} produced a value that is not of type "${targetType.name}"`,
        );
      }

      return result;
    },
  };
}
