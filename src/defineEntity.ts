import type { EntityDescriptor, TypeToken } from "./types";

/**
 * Describes a domain type and the type of its identifier.
 *
 * @example
 * ```typescript
 * class User {
 *   constructor(readonly userId: string, readonly email: string) {}
 * }
 *
 * const userEntity = defineEntity(classType(User), { idType: Types.string });
 * ```
 */
export function defineEntity<$$Entity, $$Id>(
  domainType: TypeToken<$$Entity>,
  options: {
    idType: TypeToken<$$Id>;
  },
): EntityDescriptor<$$Entity, $$Id> {
  return Object.freeze({ domainType, idType: options.idType });
}
