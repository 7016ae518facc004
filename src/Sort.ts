import { InvariantViolationError } from "./errors";

export type Direction = "ASC" | "DESC";

/**
 * Parses a direction, ignoring case.
 *
 * @throws {InvariantViolationError} For anything but `asc` or `desc`
 */
export function parseDirection(value: string): Direction {
  switch (value.trim().toUpperCase()) {
    case "ASC":
      return "ASC";
    case "DESC":
      return "DESC";
    default:
      throw new InvariantViolationError(
        `Invalid value "${value}" for orders given! Has to be either "desc" or "asc" (case insensitive).`,
      );
  }
}

/**
 * A property and the direction to order it by.
 */
export class Order {
  readonly property: string;
  readonly direction: Direction;

  constructor(property: string, direction: Direction = "ASC") {
    if (property.trim() === "") {
      throw new InvariantViolationError("Property must not be null or empty!");
    }

    this.property = property;
    this.direction = direction;
  }

  isAscending() {
    return this.direction === "ASC";
  }

  with(direction: Direction) {
    return new Order(this.property, direction);
  }

  equals(other: unknown) {
    return (
      other instanceof Order &&
      other.property === this.property &&
      other.direction === this.direction
    );
  }

  toString() {
    return `${this.property}: ${this.direction}`;
  }
}

/**
 * Sort option for queries: a non-empty list of {@link Order}s, applied in
 * sequence.
 *
 * @example
 * ```typescript
 * Sort.by("lastName", "firstName"); // both ascending
 * Sort.by("DESC", "createdAt");
 * Sort.by("lastName").and(Sort.by("DESC", "createdAt"));
 * ```
 */
export class Sort implements Iterable<Order> {
  readonly orders: readonly Order[];

  private constructor(orders: Order[]) {
    if (orders.length === 0) {
      throw new InvariantViolationError(
        "You have to provide at least one sort property to sort by!",
      );
    }

    this.orders = Object.freeze(orders);
  }

  static of(orders: Iterable<Order>): Sort {
    return new Sort([...orders]);
  }

  /**
   * Sorts ascending by the given properties.
   *
   * @remarks
   * A first argument of exactly `"ASC"` or `"DESC"` is taken as the
   * direction, never as a property. To sort by a property with one of those
   * names, use `Sort.of([new Order("DESC")])`.
   */
  static by(...properties: string[]): Sort;
  /**
   * Sorts by the given properties, all in `direction`.
   */
  static by(direction: Direction, ...properties: string[]): Sort;
  static by(...args: string[]): Sort {
    const [first, ...rest] = args;

    if (first === "ASC" || first === "DESC") {
      return new Sort(rest.map((property) => new Order(property, first)));
    }

    return new Sort(args.map((property) => new Order(property)));
  }

  /**
   * Returns a new sort with the orders of `other` appended. A `null` other
   * returns this sort.
   */
  and(other: Sort | null): Sort {
    if (other === null) {
      return this;
    }

    return new Sort([...this.orders, ...other.orders]);
  }

  getOrderFor(property: string): Order | null {
    return this.orders.find((order) => order.property === property) ?? null;
  }

  [Symbol.iterator](): Iterator<Order> {
    return this.orders[Symbol.iterator]();
  }

  equals(other: unknown) {
    return (
      other instanceof Sort &&
      other.orders.length === this.orders.length &&
      other.orders.every((order, i) => order.equals(this.orders[i]))
    );
  }

  toString() {
    return this.orders.map((order) => order.toString()).join(",");
  }
}

export function isSort(value: unknown): value is Sort {
  return value instanceof Sort;
}
