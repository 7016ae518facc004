import type { TypeToken } from "./types";

/**
 * Defines a type token from a type guard.
 *
 * @param name - Display name used in error messages
 * @param is - Guard that accepts exactly the values of this type
 *
 * @example
 * ```typescript
 * type Customer = { customerId: number; name: string };
 *
 * const CustomerType = defineType(
 *   "Customer",
 *   (value): value is Customer =>
 *     typeof value === "object" && value !== null && "customerId" in value,
 * );
 * ```
 */
export function defineType<$$Value>(
  name: string,
  is: (value: unknown) => value is $$Value,
): TypeToken<$$Value> {
  return Object.freeze({ name, is });
}

type AnyClass = abstract new (...args: never[]) => unknown;

const classTypes = new WeakMap<AnyClass, TypeToken>();

/**
 * Returns the token for a class. The same constructor always yields the same
 * token, so it can be used as a registry key.
 *
 * @remarks
 * The guard is `instanceof`, but lookups by token stay exact: the token of a
 * subclass is a different token.
 */
export function classType<$$Instance>(
  Class: abstract new (...args: never[]) => $$Instance,
): TypeToken<$$Instance> {
  const cached = classTypes.get(Class);
  if (cached) {
    // entries are only written below, keyed by the constructor they guard
    return cached as TypeToken<$$Instance>;
  }

  const token = defineType(
    Class.name,
    (value): value is $$Instance => value instanceof Class,
  );
  classTypes.set(Class, token);

  return token;
}

/**
 * Built-in tokens for the values the default converters work with.
 */
export const Types = {
  string: defineType(
    "string",
    (value): value is string => typeof value === "string",
  ),
  number: defineType(
    "number",
    (value): value is number =>
      typeof value === "number" && !Number.isNaN(value),
  ),
  bigint: defineType(
    "bigint",
    (value): value is bigint => typeof value === "bigint",
  ),
  boolean: defineType(
    "boolean",
    (value): value is boolean => typeof value === "boolean",
  ),
  date: defineType(
    "Date",
    (value): value is Date =>
      value instanceof Date && !Number.isNaN(value.getTime()),
  ),
  object: defineType(
    "object",
    (value): value is object => typeof value === "object" && value !== null,
  ),
} as const;

/**
 * Returns the built-in token describing a value.
 *
 * Anything that is not a string, number, bigint, boolean or valid date falls
 * back to `Types.object`. Pass an explicit source type to the conversion
 * service when that is too coarse.
 */
export function inferType(value: unknown): TypeToken {
  switch (typeof value) {
    case "string":
      return Types.string;
    case "number":
      return Types.number;
    case "bigint":
      return Types.bigint;
    case "boolean":
      return Types.boolean;
  }

  if (Types.date.is(value)) {
    return Types.date;
  }

  return Types.object;
}
