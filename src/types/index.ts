export type { ConversionService } from "./ConversionService";
export type { Converter } from "./Converter";
export type { DomainResolver } from "./DomainResolver";
export type { EntityDescriptor } from "./EntityDescriptor";
export type { Pageable } from "./Pageable";
export type { ParameterAccessor } from "./ParameterAccessor";
export type {
  BindableParameter,
  Parameter,
  ParameterInput,
  ParameterRole,
  Parameters,
} from "./Parameters";
export type { RepositoryHandle } from "./RepositoryHandle";
export type {
  RepositoryRegistration,
  RepositorySource,
} from "./RepositoryRegistration";
export type { ResolverPlugin } from "./ResolverPlugin";
export type { InferTypeFromToken, TypeToken } from "./TypeToken";
