import type { TypeToken } from "./TypeToken";

/**
 * Metadata about a domain type managed by a repository.
 *
 * @typeParam $$Entity - The domain type
 * @typeParam $$Id - The identifier type of the domain type
 *
 * @since 1.0.0
 */
export type EntityDescriptor<$$Entity = unknown, $$Id = unknown> = {
  readonly domainType: TypeToken<$$Entity>;
  readonly idType: TypeToken<$$Id>;
};
