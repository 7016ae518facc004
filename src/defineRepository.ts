import type {
  EntityDescriptor,
  RepositoryHandle,
  RepositoryRegistration,
  RepositorySource,
} from "./types";

/**
 * Pairs a repository with the entity it manages, checking at compile time that
 * the repository looks entities up by the entity's identifier type.
 */
export function defineRepository<$$Entity, $$Id>(
  entity: EntityDescriptor<$$Entity, $$Id>,
  repository: RepositoryHandle<$$Entity, $$Id>,
): RepositoryRegistration<$$Entity, $$Id> {
  return { entity, repository };
}

/**
 * Wraps a fixed list of registrations as a {@link RepositorySource}.
 */
export function defineRepositorySource(
  registrations: Iterable<RepositoryRegistration>,
): RepositorySource {
  return {
    getRepositories() {
      return registrations;
    },
  };
}
