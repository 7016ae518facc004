/**
 * What a positional argument of a query method is used for.
 *
 * - `pageable` - the page window (a {@link Pageable})
 * - `sort` - the ordering (a `Sort`)
 * - `bindable` - a value bound into the query
 */
export type ParameterRole = "pageable" | "sort" | "bindable";

export type Parameter = {
  /**
   * Position in the argument list.
   */
  readonly index: number;
  readonly role: ParameterRole;
  readonly name: string | null;
};

export type BindableParameter = Parameter & {
  readonly role: "bindable";

  /**
   * Position among the bindable parameters only.
   */
  readonly bindableIndex: number;
};

/**
 * The shape of a query method's argument list.
 *
 * @remarks
 * Built once per query method with `defineParameters()` and shared by every
 * invocation of it.
 */
export type Parameters = {
  readonly length: number;
  readonly parameters: readonly Parameter[];
  readonly pageableIndex: number | null;
  readonly sortIndex: number | null;
  readonly bindableParameters: readonly BindableParameter[];

  hasPageableParameter(): boolean;
  hasSortParameter(): boolean;

  /**
   * @throws {InvariantViolationError} When there is no such bindable parameter
   */
  getBindableParameter(bindableIndex: number): BindableParameter;

  /**
   * Returns the bindable index of the parameter with the given name, or `null`.
   */
  findBindableIndex(name: string): number | null;
};

export type ParameterInput =
  | ParameterRole
  | { role: ParameterRole; name?: string };
