/**
 * The lookup capability the domain resolver needs from a repository.
 *
 * @typeParam $$Entity - The entity type managed by the repository
 * @typeParam $$Id - The identifier type
 *
 * @remarks
 * `findById` returns `null` when no entity has the given identifier. Whether
 * the lookup is synchronous is up to the repository; the resolver awaits it
 * either way. Errors thrown by the repository reach the caller unchanged.
 *
 * @example
 * ```typescript
 * const userRepository: RepositoryHandle<User, string> = {
 *   async findById(id) {
 *     const row = await db.selectFrom("users").where("id", "=", id).executeTakeFirst();
 *     return row ? User.fromRow(row) : null;
 *   },
 * };
 * ```
 */
export type RepositoryHandle<$$Entity = unknown, $$Id = unknown> = {
  findById(id: $$Id): $$Entity | null | Promise<$$Entity | null>;
};
