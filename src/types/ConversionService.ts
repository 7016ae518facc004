import type { Converter } from "./Converter";
import type { TypeToken } from "./TypeToken";

/**
 * Registry of conversion rules.
 *
 * @remarks
 * Rules are consulted newest first, so a rule added later overrides the
 * built-in ones for the pairs it matches.
 */
export type ConversionService = {
  /**
   * Registers a rule.
   */
  addConverter: (converter: Converter) => void;

  /**
   * Returns `true` when a value of `sourceType` can be converted to
   * `targetType`: the types are the same token, or some rule matches.
   */
  canConvert: (sourceType: TypeToken, targetType: TypeToken) => boolean;

  /**
   * Converts a value to `targetType`.
   *
   * @param value - The value to convert
   * @param targetType - The requested type
   * @param sourceType - The type of `value`; inferred from the value when omitted
   * @returns The converted value, or `null` for a `null`/`undefined` input
   *
   * @throws {ConverterNotFoundError} When no rule handles the pair
   * @throws {ConversionError} When the rule fails or returns a value the
   * target type rejects, or when `value` is of the target type's own token but
   * its guard rejects it (`NaN` for `Types.number`)
   */
  convert: <$$Target>(
    value: unknown,
    targetType: TypeToken<$$Target>,
    sourceType?: TypeToken,
  ) => Promise<$$Target | null>;
};
