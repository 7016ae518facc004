import Database from "better-sqlite3";
import type { RepositoryHandle } from "../../src";
import { createInMemoryRepository } from "../../src/inMemory";
import { type Order, orders } from "../entities/Order";
import { type User, users } from "../entities/User";
import { createSQLiteRepositories } from "./SQLiteRepository";

/**
 * Repository backend factory, seeded with the fixtures of `test/entities`.
 */
export type RepositoryBackendType = "memory" | "sqlite";

export type Repositories = {
  users: RepositoryHandle<User, string>;
  orders: RepositoryHandle<Order, number>;
};

export interface RepositoryBackendFactory {
  type: RepositoryBackendType;
  create(): Promise<Repositories>;
  cleanup?(): Promise<void>;
}

/**
 * Create an in-memory backend factory.
 */
export function createInMemoryBackendFactory(): RepositoryBackendFactory {
  return {
    type: "memory",
    async create() {
      return {
        users: createInMemoryRepository({
          getId: (user: User) => user.userId,
          items: users,
        }),
        orders: createInMemoryRepository({
          getId: (order: Order) => order.orderId,
          items: orders,
        }),
      };
    },
  };
}

/**
 * Create a SQLite backend factory with an in-memory database.
 */
export function createSQLiteBackendFactory(): RepositoryBackendFactory {
  let repositories: ReturnType<typeof createSQLiteRepositories> | null = null;

  return {
    type: "sqlite",
    async create() {
      repositories = createSQLiteRepositories(new Database(":memory:"));
      repositories.seed({ users, orders });

      return {
        users: repositories.users,
        orders: repositories.orders,
      };
    },
    async cleanup() {
      repositories?.close();
      repositories = null;
    },
  };
}

/**
 * Get all available backend factories.
 */
export function getAllBackendFactories(): RepositoryBackendFactory[] {
  return [createInMemoryBackendFactory(), createSQLiteBackendFactory()];
}
