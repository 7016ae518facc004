import type { EntityDescriptor } from "./EntityDescriptor";
import type { RepositoryHandle } from "./RepositoryHandle";

/**
 * A repository together with the metadata of the domain type it manages.
 */
export type RepositoryRegistration<$$Entity = unknown, $$Id = unknown> = {
  readonly entity: EntityDescriptor<$$Entity, $$Id>;
  readonly repository: RepositoryHandle<$$Entity, $$Id>;
};

/**
 * Supplies every repository available in the host environment.
 *
 * @remarks
 * Read once, when the resolver is initialized. Repositories added to the host
 * later are not picked up.
 */
export type RepositorySource = {
  getRepositories(): Iterable<RepositoryRegistration>;
};
