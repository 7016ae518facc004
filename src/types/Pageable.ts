import type { Sort } from "../Sort";

/**
 * A request for one page of results.
 *
 * @property pageNumber - Zero-based page index
 * @property pageSize - Number of items per page
 * @property offset - Index of the first item, `pageNumber * pageSize`
 * @property sort - Ordering of the results, or `null` for unsorted
 */
export type Pageable = {
  readonly pageNumber: number;
  readonly pageSize: number;
  readonly offset: number;
  readonly sort: Sort | null;
};
