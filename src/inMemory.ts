/**
 * @fileoverview In-memory repository for tests and prototypes.
 */

import sortBy from "just-sort-by";
import type { Sort } from "./Sort";
import type { Pageable, RepositoryHandle } from "./types";

/**
 * One page of results from {@link InMemoryRepository.findPage}.
 */
export type Page<$$Entity> = {
  readonly content: $$Entity[];
  readonly totalElements: number;
  readonly pageable: Pageable;
};

/**
 * A {@link RepositoryHandle} with the write and listing operations tests need.
 */
export type InMemoryRepository<$$Entity, $$Id> = {
  findById(id: $$Id): Promise<$$Entity | null>;
  save(entity: $$Entity): Promise<$$Entity>;
  delete(id: $$Id): Promise<boolean>;
  count(): Promise<number>;
  findAll(sort?: Sort | null): Promise<$$Entity[]>;
  findPage(pageable: Pageable): Promise<Page<$$Entity>>;
};

/**
 * Orders items by every order of the sort, first order first. Ties keep
 * their original relative order.
 *
 * @internal
 */
export function applySort<$$Entity extends object>(
  items: $$Entity[],
  sort: Sort | null,
): $$Entity[] {
  if (sort === null) {
    return [...items];
  }

  let sorted = [...items];

  // sort by the least significant order first; each pass is stable
  for (const order of [...sort.orders].reverse()) {
    const byProperty = (item: $$Entity) => Reflect.get(item, order.property);

    sorted = order.isAscending()
      ? sortBy(sorted, byProperty)
      : sortBy(sorted.reverse(), byProperty).reverse();
  }

  return sorted;
}

/**
 * Creates a repository that keeps entities in a `Map`, keyed by the
 * identifier `getId` reads from each entity.
 *
 * @example
 * ```typescript
 * const users = createInMemoryRepository({
 *   getId: (user: User) => user.userId,
 *   items: [new User("u1", "alice@example.com")],
 * });
 *
 * resolver.registerRepository(userEntity, users);
 * ```
 */
export function createInMemoryRepository<$$Entity extends object, $$Id>(args: {
  getId: (entity: $$Entity) => $$Id;
  items?: Iterable<$$Entity>;
}): InMemoryRepository<$$Entity, $$Id> {
  const entities = new Map<$$Id, $$Entity>();

  for (const item of args.items ?? []) {
    entities.set(args.getId(item), item);
  }

  return {
    async findById(id) {
      return entities.get(id) ?? null;
    },
    async save(entity) {
      entities.set(args.getId(entity), entity);
      return entity;
    },
    async delete(id) {
      return entities.delete(id);
    },
    async count() {
      return entities.size;
    },
    async findAll(sort = null) {
      return applySort([...entities.values()], sort);
    },
    async findPage(pageable) {
      const sorted = applySort([...entities.values()], pageable.sort);

      return {
        content: sorted.slice(
          pageable.offset,
          pageable.offset + pageable.pageSize,
        ),
        totalElements: sorted.length,
        pageable,
      };
    },
  };
}
