import {
  DependencyCreationError,
  DependencyMissingError,
  DependencyTypeMismatchError,
} from '../errors/errors.js';
import type { Context } from '../core/context.js';
import { buildRegistryOpts, type RegistryOpts, type RegistryOption } from '../core/options.js';
import { globalRegistry } from '../core/registry.js';
import {
  NoConfigMarker,
  derivePairKey,
  deriveTypeKey,
  describeType,
  describeValue,
  isNoConfig,
  safeTypeAssert,
  type TypeRef,
} from '../core/type-ref.js';

/**
 * Narrow `value` to `type`, converting across the `Ref` wrapper when needed.
 *
 * @throws DependencyTypeMismatchError when the value has another type.
 *         Creation never wraps this error.
 */
export function mustTypeAssert<T>(value: unknown, type: TypeRef<T>, typeKey: string): T {
  const asserted = safeTypeAssert(value, type);
  if (!asserted.ok) {
    throw new DependencyTypeMismatchError(typeKey, describeType(type), describeValue(value));
  }
  return asserted.value;
}

function wrapFailure(
  err: unknown,
  type: TypeRef<unknown>,
  opts: RegistryOpts,
  ctx: Context
): Error {
  if (err instanceof DependencyTypeMismatchError) return err;

  opts.registry.logger.warn('creation failed', {
    type: type.name,
    token: opts.injectionToken,
    breadcrumbs: ctx.breadcrumbs(),
  });
  return new DependencyCreationError(type.name, opts.injectionToken, [...ctx.breadcrumbs()], err);
}

/**
 * Clone the caller's Context and record the active token on it.
 */
function enter(ctx: Context, opts: RegistryOpts): Context {
  const scoped = ctx.clone();
  scoped.appendBreadcrumb(opts.injectionToken);
  return scoped;
}

/**
 * Invoke `attempt` with the token-qualified key. When that exact key is not
 * registered and a token is active, try the unqualified key once.
 */
async function withTokenFallback(
  type: TypeRef<unknown>,
  opts: RegistryOpts,
  ctx: Context,
  attempt: (typeKey: string) => Promise<unknown>
): Promise<{ typeKey: string; value: unknown }> {
  const typeKey = deriveTypeKey(type.name, opts.injectionToken);

  try {
    return { typeKey, value: await attempt(typeKey) };
  } catch (err) {
    const missing = err instanceof DependencyMissingError && err.typeKey === typeKey;
    if (!missing || opts.injectionToken.length === 0) throw wrapFailure(err, type, opts, ctx);
  }

  opts.registry.logger.debug('no binding for token, falling back', {
    typeKey,
    fallback: type.name,
  });

  try {
    return { typeKey: type.name, value: await attempt(type.name) };
  } catch (err) {
    throw wrapFailure(err, type, opts, ctx);
  }
}

/**
 * Create (or return the cached) instance of `type`.
 *
 * With `withToken(t)`, the binding registered under `t` is used, falling
 * back to the unqualified binding when `t` has none.
 *
 * @throws DependencyCreationError wrapping the underlying failure
 * @throws DependencyTypeMismatchError when the factory returned another type
 *
 * @example
 * ```typescript
 * const clock = await create(ctx, Clock);
 * const replica = await create(ctx, Database, withToken(ReplicaToken));
 * ```
 */
export async function create<T>(
  ctx: Context,
  type: TypeRef<T>,
  ...options: Array<RegistryOption | undefined>
): Promise<T> {
  const opts = buildRegistryOpts(globalRegistry(), options);
  const scoped = enter(ctx, opts);

  const { typeKey, value } = await withTokenFallback(type, opts, scoped, (key) =>
    opts.registry.create(scoped, key, undefined, opts)
  );
  return mustTypeAssert(value, type, typeKey);
}

/**
 * Create (or return the cached) configuration of `type`. Token fallback as
 * in {@link create}.
 */
export async function createConfiguration<T>(
  ctx: Context,
  type: TypeRef<T>,
  ...options: Array<RegistryOption | undefined>
): Promise<T> {
  const opts = buildRegistryOpts(globalRegistry(), options);
  const scoped = enter(ctx, opts);

  const { typeKey, value } = await withTokenFallback(type, opts, scoped, (key) =>
    opts.registry.createConfiguration(scoped, key, opts)
  );
  return mustTypeAssert(value, type, typeKey);
}

/**
 * Create an instance registered with {@link registerPair}.
 *
 * The configuration is created first, unless `configType` is `NoConfig` or
 * one was supplied with `withConfiguration`, and handed to the instance
 * factory. Pairs have no token fallback.
 */
export async function createPair<T, CT>(
  ctx: Context,
  type: TypeRef<T>,
  configType: TypeRef<CT>,
  ...options: Array<RegistryOption | undefined>
): Promise<T> {
  const opts = buildRegistryOpts(globalRegistry(), options);
  const scoped = enter(ctx, opts);
  const configKey = deriveTypeKey(configType.name, opts.injectionToken);
  const instanceKey = deriveTypeKey(type.name, opts.injectionToken);

  let config: unknown;
  if (opts.configuration !== undefined) {
    config = mustTypeAssert(opts.configuration, configType, configKey);
  } else if (isNoConfig(configType)) {
    config = new NoConfigMarker();
  } else {
    const pairKey = derivePairKey(configKey, instanceKey);
    let raw: unknown;
    try {
      raw = await opts.registry.createConfiguration(scoped, pairKey, opts);
    } catch (err) {
      throw wrapFailure(err, configType, opts, scoped);
    }
    config = mustTypeAssert(raw, configType, pairKey);
  }

  const pairKey = derivePairKey(instanceKey, configKey);
  let value: unknown;
  try {
    value = await opts.registry.create(scoped, pairKey, config, opts);
  } catch (err) {
    throw wrapFailure(err, type, opts, scoped);
  }
  return mustTypeAssert(value, type, pairKey);
}
