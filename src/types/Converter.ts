import type { TypeToken } from "./TypeToken";

/**
 * A conditional conversion rule.
 *
 * @remarks
 * Rules do not declare a fixed pair of types up front. Instead the conversion
 * service asks `matches` for every request, so a rule can base its answer on
 * state that changes over time (the domain resolver answers from its
 * repository registry).
 *
 * `convert` is only called after `matches` returned `true` for the same pair,
 * and never with `null` or `undefined`.
 */
export type Converter = {
  /**
   * Name reported in conversion errors.
   */
  readonly name?: string;

  matches(sourceType: TypeToken, targetType: TypeToken): boolean;

  convert(
    value: unknown,
    sourceType: TypeToken,
    targetType: TypeToken,
  ): unknown | Promise<unknown>;
};
