import { isPageable } from "./PageRequest";
import { isSort } from "./Sort";
import { InvariantViolationError } from "./errors";
import type { ParameterAccessor, Parameters } from "./types";

/**
 * Creates an accessor over the arguments of one query method invocation.
 *
 * @param parameters - The shape of the method's argument list
 * @param values - The arguments, one per parameter
 *
 * @returns An immutable accessor; later changes to `values` do not affect it
 *
 * @throws {InvariantViolationError} When either argument is missing or the
 * number of values does not match the number of parameters
 *
 * @remarks
 * The accessor does not inspect argument types to decide what they are used
 * for; that is entirely up to `parameters`. It only checks that a value given
 * in the pageable or sort position is a page request or a sort.
 *
 * @example
 * ```typescript
 * const parameters = defineParameters(["bindable", "pageable", "bindable"]);
 * const accessor = createParameterAccessor(parameters, [
 *   "abc",
 *   PageRequest.of(0, 10, Sort.by("name")),
 *   null,
 * ]);
 *
 * accessor.getSort(); // name: ASC
 * [...accessor.bindableValues()]; // ["abc", null]
 * accessor.hasAnyBindableNull(); // true
 * ```
 */
export function createParameterAccessor(
  parameters: Parameters,
  values: readonly unknown[],
): ParameterAccessor {
  if (!parameters) {
    throw new InvariantViolationError("Parameters must not be null!");
  }
  if (!values) {
    throw new InvariantViolationError("Values must not be null!");
  }
  if (parameters.length !== values.length) {
    throw new InvariantViolationError(
      `Invalid number of parameters given! Expected ${parameters.length} but got ${values.length}`,
    );
  }

  const _values = Object.freeze([...values]);

  const getPageable = () => {
    if (parameters.pageableIndex === null) {
      return null;
    }

    const pageable = _values[parameters.pageableIndex];
    if (pageable === null || pageable === undefined) {
      return null;
    }
    if (!isPageable(pageable)) {
      throw new InvariantViolationError(
        `Argument at position ${parameters.pageableIndex} is not a page request`,
      );
    }

    return pageable;
  };

  const getBindableValue = (bindableIndex: number) => {
    return _values[parameters.getBindableParameter(bindableIndex).index];
  };

  function* bindableValues() {
    for (let i = 0; i < parameters.bindableParameters.length; i++) {
      yield getBindableValue(i);
    }
  }

  return {
    getParameters() {
      return parameters;
    },
    getPageable,
    getSort() {
      // 1. explicit sort argument
      if (parameters.sortIndex !== null) {
        const sort = _values[parameters.sortIndex];
        if (sort === null || sort === undefined) {
          return null;
        }
        if (!isSort(sort)) {
          throw new InvariantViolationError(
            `Argument at position ${parameters.sortIndex} is not a sort`,
          );
        }

        return sort;
      }

      // 2. sort of the page request
      return getPageable()?.sort ?? null;
    },
    getValue(index) {
      if (index < 0 || index >= _values.length) {
        throw new InvariantViolationError(
          `Invalid argument index ${index}, there are ${_values.length} arguments`,
        );
      }

      return _values[index];
    },
    getBindableValue,
    getBindableValueByName(name) {
      const bindableIndex = parameters.findBindableIndex(name);
      if (bindableIndex === null) {
        throw new InvariantViolationError(
          `No bindable parameter named "${name}"`,
        );
      }

      return getBindableValue(bindableIndex);
    },
    hasAnyBindableNull() {
      return parameters.bindableParameters.some((parameter) => {
        const value = _values[parameter.index];
        return value === null || value === undefined;
      });
    },
    bindableValues,
    [Symbol.iterator]: bindableValues,
  };
}
