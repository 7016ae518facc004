import type { TypeToken } from "./TypeToken";

/**
 * Plugin interface for observing domain lookups.
 *
 * @remarks
 * Plugins run after the repository lookup finished, in parallel via
 * `Promise.allSettled`. A failing plugin never changes the lookup result;
 * its error is passed to `onPluginError` when the resolver has one.
 *
 * @example
 * ```typescript
 * const lookupLog: ResolverPlugin = {
 *   onResolved({ domainType, id, entity }) {
 *     logger.debug({ domainType: domainType.name, id, found: entity !== null });
 *   },
 * };
 *
 * const resolver = createDomainResolver({
 *   conversionService,
 *   plugins: [lookupLog],
 * });
 * ```
 */
export type ResolverPlugin = {
  /**
   * Called after every lookup that reached a repository.
   *
   * @param args.entity - The entity found, or `null` when there was none
   */
  onResolved?: (args: {
    domainType: TypeToken;
    id: unknown;
    entity: unknown;
  }) => void | Promise<void>;
};
