export { createConversionService } from "./createConversionService";
export { createDomainResolver } from "./createDomainResolver";
export { createParameterAccessor } from "./createParameterAccessor";
export { defineConverter } from "./defineConverter";
export { defineEntity } from "./defineEntity";
export { defineParameters } from "./defineParameters";
export { defineRepository, defineRepositorySource } from "./defineRepository";
export { classType, defineType, inferType, Types } from "./defineType";
export {
  ConversionError,
  ConverterNotFoundError,
  InvariantViolationError,
  RepobindError,
  UnresolvedDomainTypeError,
} from "./errors";
export { isPageable, PageRequest } from "./PageRequest";
export { type Direction, isSort, Order, parseDirection, Sort } from "./Sort";
export type {
  BindableParameter,
  ConversionService,
  Converter,
  DomainResolver,
  EntityDescriptor,
  InferTypeFromToken,
  Pageable,
  Parameter,
  ParameterAccessor,
  ParameterInput,
  ParameterRole,
  Parameters,
  RepositoryHandle,
  RepositoryRegistration,
  RepositorySource,
  ResolverPlugin,
  TypeToken,
} from "./types";
