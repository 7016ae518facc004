import { InvariantViolationError, UnresolvedDomainTypeError } from "./errors";
import type {
  ConversionService,
  DomainResolver,
  RepositoryRegistration,
  ResolverPlugin,
  TypeToken,
} from "./types";

/**
 * Creates a resolver that turns identifier-like values into domain objects.
 *
 * @param args - Resolver configuration
 * @param args.conversionService - Converts source values to identifier types,
 * and receives the resolver as a rule on `initialize`
 * @param args.plugins - Optional observers notified after every lookup
 * @param args.onPluginError - Optional callback to handle plugin failures
 *
 * @returns A resolver with an empty registry
 *
 * @remarks
 * The registry is keyed by the domain type token itself, so each domain type
 * has at most one repository and lookups never depend on insertion order.
 * Lookups are exact: a repository registered for `Animal` does not resolve
 * `Dog`.
 *
 * ```
 * source → conversionService.convert(source, idType) → repository.findById(id) → Plugins
 * ```
 *
 * The registry is filled in a single pass by `initialize` (or by
 * `registerRepository` calls before it) and is read-only afterwards.
 *
 * @example
 * ```typescript
 * const conversionService = createConversionService();
 * const resolver = createDomainResolver({ conversionService });
 *
 * resolver.initialize(
 *   defineRepositorySource([
 *     defineRepository(userEntity, userRepository),
 *     defineRepository(orderEntity, orderRepository),
 *   ]),
 * );
 *
 * // path variable "42" → Order with orderId 42
 * const order = await conversionService.convert("42", OrderType);
 * ```
 */
export function createDomainResolver(args: {
  conversionService: ConversionService;
  plugins?: ResolverPlugin[];
  onPluginError?: (error: unknown, plugin: ResolverPlugin) => void;
}): DomainResolver {
  const { conversionService } = args;
  const registrations = new Map<TypeToken, RepositoryRegistration>();

  let initialized = false;

  const findRegistration = (domainType: TypeToken) =>
    registrations.get(domainType) ?? null;

  const runPlugins = async (lookup: {
    domainType: TypeToken;
    id: unknown;
    entity: unknown;
  }) => {
    const plugins = args.plugins ?? [];
    if (plugins.length === 0) {
      return;
    }

    const pluginResults = await Promise.allSettled(
      plugins.map((plugin) =>
        // wrap so that synchronous throws are settled too
        (async () => {
          return await plugin.onResolved?.(lookup);
        })(),
      ),
    );

    if (args.onPluginError) {
      pluginResults.forEach((pluginResult, i) => {
        const plugin = plugins[i];

        if (pluginResult.status === "rejected" && plugin) {
          args.onPluginError?.(pluginResult.reason, plugin);
        }
      });
    }
  };

  const resolver: DomainResolver = {
    name: "DomainResolver",

    registerRepository(entity, repository) {
      if (initialized) {
        throw new InvariantViolationError(
          `Cannot register a repository for "${entity.domainType.name}" after the resolver was initialized`,
        );
      }

      const existing = registrations.get(entity.domainType);
      if (existing) {
        if (existing.entity === entity && existing.repository === repository) {
          return;
        }

        throw new InvariantViolationError(
          `A repository is already registered for domain type "${entity.domainType.name}"`,
        );
      }

      registrations.set(entity.domainType, { entity, repository });
    },

    findRegistrationFor(domainType) {
      return findRegistration(domainType)?.entity ?? null;
    },

    canConvert(sourceType, domainType) {
      const registration = findRegistration(domainType);
      if (!registration) {
        return false;
      }

      return conversionService.canConvert(
        sourceType,
        registration.entity.idType,
      );
    },

    matches(sourceType, targetType) {
      return resolver.canConvert(sourceType, targetType);
    },

    async convert(source, sourceType, domainType) {
      // 1. find the repository
      const registration = findRegistration(domainType);
      if (!registration) {
        throw new UnresolvedDomainTypeError(domainType.name);
      }

      // 2. convert the source into the identifier type
      const id = await conversionService.convert(
        source,
        registration.entity.idType,
        sourceType,
      );
      if (id === null) {
        return null;
      }

      // 3. look the entity up
      const entity = (await registration.repository.findById(id)) ?? null;
      if (entity === null) {
        await runPlugins({ domainType, id, entity });
        return null;
      }
      if (!domainType.is(entity)) {
        throw new InvariantViolationError(
          `Repository for "${domainType.name}" returned a value that is not a "${domainType.name}"`,
        );
      }

      // 4. notify plugins
      await runPlugins({ domainType, id, entity });

      return entity;
    },

    initialize(source) {
      if (initialized) {
        return;
      }

      for (const { entity, repository } of source.getRepositories()) {
        resolver.registerRepository(entity, repository);
      }

      initialized = true;
      conversionService.addConverter(resolver);
    },

    isInitialized() {
      return initialized;
    },
  };

  return resolver;
}
