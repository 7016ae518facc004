/**
 * Runtime stand-in for a type.
 *
 * @typeParam $$Value - The type of the values the token describes
 *
 * @remarks
 * Tokens are compared by reference. Two tokens with the same `name` are
 * different types; use {@link classType} or a shared constant so that every
 * part of the program refers to the same token.
 *
 * @example
 * ```typescript
 * const UserId = defineType("UserId", (value): value is string =>
 *   typeof value === "string" && value.startsWith("user_"),
 * );
 * ```
 */
export type TypeToken<$$Value = unknown> = {
  readonly name: string;
  is(value: unknown): value is $$Value;
};

/**
 * Extracts the value type described by a {@link TypeToken}.
 */
export type InferTypeFromToken<$$TypeToken> =
  $$TypeToken extends TypeToken<infer $$Value> ? $$Value : never;
