import type { Sort } from "../Sort";
import type { Pageable } from "./Pageable";
import type { Parameters } from "./Parameters";

/**
 * Read-only view over the arguments of one query method invocation.
 *
 * @remarks
 * Arguments are classified by the {@link Parameters} shape only. `null` and
 * `undefined` are both treated as "no value".
 *
 * Iterating the accessor yields the bindable values, like `bindableValues()`.
 */
export type ParameterAccessor = Iterable<unknown> & {
  getParameters(): Parameters;

  /**
   * Returns the page request, or `null` when the method takes none or the
   * argument is absent.
   */
  getPageable(): Pageable | null;

  /**
   * Returns the explicit sort argument if the method takes one, otherwise the
   * sort of the page request, otherwise `null`.
   */
  getSort(): Sort | null;

  /**
   * Returns the argument at a position of the full argument list.
   */
  getValue(index: number): unknown;

  /**
   * Returns the raw value of the bindable parameter at `bindableIndex`.
   */
  getBindableValue(bindableIndex: number): unknown;

  /**
   * @throws {InvariantViolationError} When no bindable parameter has that name
   */
  getBindableValueByName(name: string): unknown;

  hasAnyBindableNull(): boolean;

  /**
   * Returns a new iterator over the bindable values, in bindable order.
   */
  bindableValues(): IterableIterator<unknown>;
};
