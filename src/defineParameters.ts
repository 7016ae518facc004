import { InvariantViolationError } from "./errors";
import type {
  BindableParameter,
  Parameter,
  ParameterInput,
  Parameters,
} from "./types";

/**
 * Defines the shape of a query method's argument list.
 *
 * @param inputs - One entry per positional argument: a role, or a role with a
 * parameter name
 *
 * @returns The shape, with the bindable parameters numbered in order
 *
 * @throws {InvariantViolationError} For more than one pageable or sort
 * parameter, a bindable name used twice, or an unknown role
 *
 * @example
 * ```typescript
 * // findByLastName(lastName: string, pageable: Pageable, status: Status)
 * const parameters = defineParameters([
 *   { role: "bindable", name: "lastName" },
 *   "pageable",
 *   { role: "bindable", name: "status" },
 * ]);
 *
 * parameters.pageableIndex; // 1
 * parameters.getBindableParameter(1).index; // 2
 * ```
 */
export function defineParameters(
  inputs: readonly ParameterInput[],
): Parameters {
  const parameters: Parameter[] = [];
  const bindableParameters: BindableParameter[] = [];
  let pageableIndex: number | null = null;
  let sortIndex: number | null = null;

  for (const [index, input] of inputs.entries()) {
    const role = typeof input === "string" ? input : input.role;
    const name = typeof input === "string" ? null : (input.name ?? null);

    switch (role) {
      case "pageable": {
        if (pageableIndex !== null) {
          throw new InvariantViolationError(
            `Only one pageable parameter is allowed, found at positions ${pageableIndex} and ${index}`,
          );
        }
        pageableIndex = index;
        parameters.push({ index, role, name });
        break;
      }

      case "sort": {
        if (sortIndex !== null) {
          throw new InvariantViolationError(
            `Only one sort parameter is allowed, found at positions ${sortIndex} and ${index}`,
          );
        }
        sortIndex = index;
        parameters.push({ index, role, name });
        break;
      }

      case "bindable": {
        if (
          name !== null &&
          bindableParameters.some((parameter) => parameter.name === name)
        ) {
          throw new InvariantViolationError(
            `Duplicate bindable parameter name "${name}"`,
          );
        }
        const parameter: BindableParameter = {
          index,
          role,
          name,
          bindableIndex: bindableParameters.length,
        };
        bindableParameters.push(parameter);
        parameters.push(parameter);
        break;
      }

      default: {
        throw new InvariantViolationError(
          `Unknown parameter role "${role}" at position ${index}`,
        );
      }
    }
  }

  const _pageableIndex = pageableIndex;
  const _sortIndex = sortIndex;

  // the shape is shared by every invocation of the method
  return Object.freeze({
    length: parameters.length,
    parameters: Object.freeze(parameters),
    pageableIndex: _pageableIndex,
    sortIndex: _sortIndex,
    bindableParameters: Object.freeze(bindableParameters),

    hasPageableParameter() {
      return _pageableIndex !== null;
    },
    hasSortParameter() {
      return _sortIndex !== null;
    },
    getBindableParameter(bindableIndex: number) {
      const parameter = bindableParameters[bindableIndex];

      if (!parameter) {
        throw new InvariantViolationError(
          `Invalid bindable parameter index ${bindableIndex}, there are ${bindableParameters.length} bindable parameters`,
        );
      }

      return parameter;
    },
    findBindableIndex(name: string) {
      return (
        bindableParameters.find((parameter) => parameter.name === name)
          ?.bindableIndex ?? null
      );
    },
  });
}
