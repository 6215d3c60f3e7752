import type { Context } from '../core/context.js';
import { memoizeConfiguration, memoizeInstance } from '../core/hot-memory.js';
import { buildRegistryOpts, type RegistryOpts, type RegistryOption } from '../core/options.js';
import { globalRegistry } from '../core/registry.js';
import { derivePairKey, deriveTypeKey, type TypeRef } from '../core/type-ref.js';
import { mustTypeAssert } from './create.js';

/**
 * Factory for a dependency that needs no configuration, or for a configuration.
 */
export type Factory<T> = (ctx: Context, opts: RegistryOpts) => T | Promise<T>;

/**
 * Factory for the instance side of a pair. Receives the configuration
 * created by the pair's configuration factory.
 */
export type PairFactory<T, CT> = (ctx: Context, opts: RegistryOpts, config: CT) => T | Promise<T>;

/**
 * Register a singleton factory for `type`.
 *
 * The first successful call is cached; later creations with the same key
 * return the same value. Registering again under the same key replaces the
 * factory.
 *
 * @example
 * ```typescript
 * const Clock = typeOf(SystemClock);
 * register(Clock, () => new SystemClock());
 * register(Clock, () => new FrozenClock(), withToken(TestToken));
 * ```
 */
export function register<T>(
  type: TypeRef<T>,
  factory: Factory<T>,
  ...options: Array<RegistryOption | undefined>
): void {
  const opts = buildRegistryOpts(globalRegistry(), options);
  const registry = opts.registry;
  const typeKey = deriveTypeKey(type.name, opts.injectionToken);

  registry.register(
    typeKey,
    memoizeInstance(registry, (ctx, callOpts) => factory(ctx, callOpts), typeKey),
    opts
  );
  registry.logger.debug('registered', { typeKey });
}

/**
 * Register a singleton factory for a configuration type.
 */
export function registerConfiguration<T>(
  type: TypeRef<T>,
  factory: Factory<T>,
  ...options: Array<RegistryOption | undefined>
): void {
  const opts = buildRegistryOpts(globalRegistry(), options);
  const registry = opts.registry;
  const typeKey = deriveTypeKey(type.name, opts.injectionToken);

  registry.registerConfiguration(typeKey, memoizeConfiguration(registry, factory, typeKey), opts);
  registry.logger.debug('registered configuration', { typeKey });
}

/**
 * Register an instance type together with the configuration it is built from.
 *
 * The configuration side is stored under `configKey;instanceKey`, the
 * instance side under `instanceKey;configKey`. Omit `configFactory` when
 * `configType` is {@link NoConfig}, or when callers always pass the
 * configuration with `withConfiguration`.
 *
 * @example
 * ```typescript
 * registerPair(
 *   Database,
 *   DatabaseConfig,
 *   (_ctx, _opts, cfg) => Database.connect(cfg),
 *   (ctx, opts) => configurationLookup(ctx, DatabaseConfig, withOpts(opts))
 * );
 * ```
 */
export function registerPair<T, CT>(
  type: TypeRef<T>,
  configType: TypeRef<CT>,
  factory: PairFactory<T, CT>,
  configFactory?: Factory<CT>,
  ...options: Array<RegistryOption | undefined>
): void {
  const opts = buildRegistryOpts(globalRegistry(), options);
  const registry = opts.registry;
  const configKey = deriveTypeKey(configType.name, opts.injectionToken);
  const instanceKey = deriveTypeKey(type.name, opts.injectionToken);

  if (configFactory) {
    const pairKey = derivePairKey(configKey, instanceKey);
    registry.registerConfiguration(
      pairKey,
      memoizeConfiguration(registry, configFactory, pairKey),
      opts
    );
    registry.logger.debug('registered configuration', { typeKey: pairKey });
  }

  const pairKey = derivePairKey(instanceKey, configKey);
  const typed = (ctx: Context, callOpts: RegistryOpts, config: unknown) =>
    factory(ctx, callOpts, mustTypeAssert(config, configType, pairKey));

  registry.register(pairKey, memoizeInstance(registry, typed, pairKey), opts);
  registry.logger.debug('registered', { typeKey: pairKey });
}
