import type { EntityDescriptor } from "./EntityDescriptor";
import type { RepositoryHandle } from "./RepositoryHandle";
import type { RepositorySource } from "./RepositoryRegistration";
import type { TypeToken } from "./TypeToken";

/**
 * Converts identifier-like values into domain objects by looking them up in
 * the repository that manages the requested domain type.
 *
 * @remarks
 * A resolver is itself a `Converter`. `initialize` adds it to the conversion
 * service, after which `conversionService.convert("42", UserType)` loads the
 * user with id `42`.
 */
export type DomainResolver = {
  readonly name: string;

  /**
   * Registers the repository for a domain type.
   *
   * @throws {InvariantViolationError} When a different repository is already
   * registered for the domain type, or the resolver is initialized
   */
  registerRepository: <$$Entity, $$Id>(
    entity: EntityDescriptor<$$Entity, $$Id>,
    repository: RepositoryHandle<$$Entity, $$Id>,
  ) => void;

  /**
   * Returns the metadata registered for exactly this domain type, or `null`.
   */
  findRegistrationFor: (domainType: TypeToken) => EntityDescriptor | null;

  /**
   * Returns `true` when the domain type is registered and the conversion
   * service can convert `sourceType` to its identifier type.
   */
  canConvert: (sourceType: TypeToken, domainType: TypeToken) => boolean;

  /**
   * Same as `canConvert`; the conversion service asks this before routing a
   * request to the resolver.
   */
  matches: (sourceType: TypeToken, targetType: TypeToken) => boolean;

  /**
   * Loads the domain object identified by `source`.
   *
   * @returns The entity, or `null` when `source` is absent or the repository
   * has no entity with that identifier
   *
   * @throws {UnresolvedDomainTypeError} When no repository manages the domain type
   * @throws {ConversionError} When `source` cannot be converted to the identifier type
   */
  convert: <$$Entity>(
    source: unknown,
    sourceType: TypeToken,
    domainType: TypeToken<$$Entity>,
  ) => Promise<$$Entity | null>;

  /**
   * Registers every repository the source supplies, then adds the resolver to
   * the conversion service. Later calls do nothing.
   */
  initialize: (source: RepositorySource) => void;

  isInitialized: () => boolean;
};
