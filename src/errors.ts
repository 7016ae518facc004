/**
 * Base error for everything thrown by repobind itself.
 *
 * @remarks
 * Errors raised by collaborators (repositories, custom converters) are not
 * wrapped in this hierarchy unless they pass through the conversion service,
 * which reports them as a {@link ConversionError} with the original `cause`.
 */
export class RepobindError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RepobindError";
    this.code = code;
  }
}

/**
 * A precondition or internal invariant does not hold. Always a caller bug.
 */
export class InvariantViolationError extends RepobindError {
  constructor(message: string) {
    super(message, "INVARIANT_VIOLATION");
    this.name = "InvariantViolationError";
  }
}

/**
 * No repository manages the requested domain type.
 *
 * Callers are expected to gate with `canConvert` first.
 */
export class UnresolvedDomainTypeError extends RepobindError {
  readonly domainTypeName: string;

  constructor(domainTypeName: string) {
    super(
      `No repository is registered for domain type "${domainTypeName}"`,
      "UNRESOLVED_DOMAIN_TYPE",
    );
    this.name = "UnresolvedDomainTypeError";
    this.domainTypeName = domainTypeName;
  }
}

/**
 * A value could not be converted to the requested type.
 */
export class ConversionError extends RepobindError {
  readonly sourceTypeName: string;
  readonly targetTypeName: string;

  constructor(
    sourceTypeName: string,
    targetTypeName: string,
    message?: string,
    options?: { cause?: unknown },
  ) {
    super(
      message ??
        `Failed to convert from type "${sourceTypeName}" to type "${targetTypeName}"`,
      "CONVERSION_FAILED",
      options,
    );
    this.name = "ConversionError";
    this.sourceTypeName = sourceTypeName;
    this.targetTypeName = targetTypeName;
  }
}

/**
 * No registered converter handles the requested pair of types.
 */
export class ConverterNotFoundError extends ConversionError {
  constructor(sourceTypeName: string, targetTypeName: string) {
    super(
      sourceTypeName,
      targetTypeName,
      `No converter found capable of converting from type "${sourceTypeName}" to type "${targetTypeName}"`,
    );
    this.name = "ConverterNotFoundError";
  }
}
