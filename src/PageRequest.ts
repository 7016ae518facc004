import * as v from "valibot";
import { type Sort, isSort } from "./Sort";
import { InvariantViolationError } from "./errors";
import type { Pageable } from "./types";

const PageNumberSchema = v.pipe(
  v.number(),
  v.integer(),
  v.minValue(0, "Page index must not be less than zero!"),
);

const PageSizeSchema = v.pipe(
  v.number(),
  v.integer(),
  v.minValue(1, "Page size must not be less than one!"),
);

const PageableSchema = v.object({
  pageNumber: PageNumberSchema,
  pageSize: PageSizeSchema,
  offset: v.number(),
  sort: v.nullable(v.custom<Sort>(isSort)),
});

function check<$$Schema extends v.GenericSchema>(
  schema: $$Schema,
  input: unknown,
): v.InferOutput<$$Schema> {
  const result = v.safeParse(schema, input);

  if (!result.success) {
    throw new InvariantViolationError(
      result.issues.map((issue) => issue.message).join("; "),
    );
  }

  return result.output;
}

/**
 * Basic {@link Pageable} implementation.
 *
 * @example
 * ```typescript
 * const first = PageRequest.of(0, 20, Sort.by("DESC", "createdAt"));
 * first.offset; // 0
 * first.next().offset; // 20
 * ```
 */
export class PageRequest implements Pageable {
  readonly pageNumber: number;
  readonly pageSize: number;
  readonly offset: number;
  readonly sort: Sort | null;

  private constructor(pageNumber: number, pageSize: number, sort: Sort | null) {
    this.pageNumber = check(PageNumberSchema, pageNumber);
    this.pageSize = check(PageSizeSchema, pageSize);
    this.offset = this.pageNumber * this.pageSize;
    this.sort = sort;
  }

  /**
   * @param page - Zero-based page index
   * @param size - Size of the page, at least 1
   * @param sort - Optional ordering
   *
   * @throws {InvariantViolationError} For a negative page or a size below 1
   */
  static of(page: number, size: number, sort: Sort | null = null): PageRequest {
    return new PageRequest(page, size, sort);
  }

  next(): PageRequest {
    return new PageRequest(this.pageNumber + 1, this.pageSize, this.sort);
  }

  hasPrevious() {
    return this.pageNumber > 0;
  }

  previousOrFirst(): PageRequest {
    return this.hasPrevious()
      ? new PageRequest(this.pageNumber - 1, this.pageSize, this.sort)
      : this.first();
  }

  first(): PageRequest {
    return new PageRequest(0, this.pageSize, this.sort);
  }

  equals(other: unknown) {
    if (!(other instanceof PageRequest)) {
      return false;
    }

    const sameSort =
      other.sort === null ? this.sort === null : other.sort.equals(this.sort);

    return (
      other.pageNumber === this.pageNumber &&
      other.pageSize === this.pageSize &&
      sameSort
    );
  }

  toString() {
    return `Page request [number: ${this.pageNumber}, size ${this.pageSize}, sort: ${this.sort ?? "UNSORTED"}]`;
  }
}

/**
 * Returns `true` for any value shaped like a {@link Pageable}, not only
 * {@link PageRequest} instances.
 */
export function isPageable(value: unknown): value is Pageable {
  return v.is(PageableSchema, value);
}
