import { CircularDependencyError, DependencyMissingError } from '../errors/errors.js';
import type { Context } from './context.js';
import type { RegistryOpts } from './options.js';
import {
  hotInstanceKey,
  type ConfigurationFactory,
  type InstanceFactory,
  type Registry,
} from './registry.js';

type Probe = { hit: true; value: unknown } | { hit: false };

function probeHotInstance(
  registry: Registry,
  ctx: Context,
  opts: RegistryOpts,
  typeKey: string
): Probe {
  try {
    return { hit: true, value: registry.getHotInstance(ctx, opts, typeKey) };
  } catch (err) {
    if (err instanceof DependencyMissingError) return { hit: false };
    throw err;
  }
}

/**
 * Return the hot instance for `typeKey`, building and caching it on a miss.
 *
 * Builds go through {@link Registry.construct}, so concurrent first calls
 * share one factory invocation. The cache key is appended to the Context's
 * construction trail before the factory runs; a nested creation that asks
 * for a key already on the trail fails instead of waiting on itself, and
 * the registry rejects a join that would close a wait cycle across
 * concurrent builds.
 */
async function fromHotMemory(
  registry: Registry,
  ctx: Context,
  opts: RegistryOpts,
  typeKey: string,
  build: (ctx: Context) => unknown
): Promise<unknown> {
  const cached = probeHotInstance(registry, ctx, opts, typeKey);
  if (cached.hit) return cached.value;

  const cacheKey = hotInstanceKey(opts, typeKey);
  if (ctx.isConstructing(cacheKey)) {
    throw new CircularDependencyError([...ctx.constructionTrail(), cacheKey]);
  }

  return registry.construct(
    cacheKey,
    async () => {
      const scoped = ctx.clone();
      scoped.enterConstruction(cacheKey);

      const instance = await build(scoped);
      registry.setHotInstance(ctx, opts, typeKey, instance);
      return instance;
    },
    ctx.constructionTrail()
  );
}

/**
 * Wrap an instance factory so that its first successful result is cached
 * under `typeKey` and returned by every later call.
 */
export function memoizeInstance(
  registry: Registry,
  factory: InstanceFactory,
  typeKey: string
): InstanceFactory {
  return (ctx, opts, config) =>
    fromHotMemory(registry, ctx, opts, typeKey, (scoped) => factory(scoped, opts, config));
}

/**
 * Configuration counterpart of {@link memoizeInstance}.
 */
export function memoizeConfiguration(
  registry: Registry,
  factory: ConfigurationFactory,
  typeKey: string
): ConfigurationFactory {
  return (ctx, opts) =>
    fromHotMemory(registry, ctx, opts, typeKey, (scoped) => factory(scoped, opts));
}
