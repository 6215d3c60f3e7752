import { CircularDependencyError, DependencyMissingError } from '../errors/errors.js';
import { NullLogger, type Logger } from '../logging/logger.js';
import type { Context } from './context.js';
import type { RegistryOpts } from './options.js';
import { deriveTypeKey } from './type-ref.js';

/**
 * Untyped instance factory as stored by a {@link Registry}. Receives the
 * configuration produced by the paired configuration factory, or
 * `undefined` for configuration-less registrations.
 */
export type InstanceFactory = (ctx: Context, opts: RegistryOpts, config: unknown) => unknown;

/**
 * Untyped configuration factory as stored by a {@link Registry}.
 */
export type ConfigurationFactory = (ctx: Context, opts: RegistryOpts) => unknown;

/**
 * Immutable record of a factory and the options present when it was registered.
 */
export interface Registration<F> {
  readonly factory: F;
  readonly opts: Readonly<RegistryOpts>;
}

/**
 * Type-keyed factory store with a hot-instance cache.
 *
 * Registration is a wiring phase and must not run concurrently with
 * creation. Once wiring is done, creation may run concurrently; the
 * hot-instance cache is the only state mutated afterwards and is guarded
 * per cache key by {@link Registry.construct}.
 */
export interface Registry {
  readonly logger: Logger;

  /** Store `factory` under `typeKey`. Re-registering replaces the previous factory. */
  register(typeKey: string, factory: InstanceFactory, opts: RegistryOpts): void;

  /** Store `factory` under `typeKey` in the configuration namespace. */
  registerConfiguration(typeKey: string, factory: ConfigurationFactory, opts: RegistryOpts): void;

  /**
   * Invoke the instance factory stored under `typeKey`.
   *
   * @throws DependencyMissingError when nothing is registered under `typeKey`.
   *         Errors from the factory propagate unchanged.
   */
  create(ctx: Context, typeKey: string, config: unknown, opts: RegistryOpts): Promise<unknown>;

  /**
   * Invoke the configuration factory stored under `typeKey`.
   *
   * @throws DependencyMissingError when nothing is registered under `typeKey`.
   */
  createConfiguration(ctx: Context, typeKey: string, opts: RegistryOpts): Promise<unknown>;

  /**
   * Read the hot instance for `typeKey`, qualified by the token in `opts`.
   *
   * @throws DependencyMissingError on a miss. Callers treat it as a cache miss.
   */
  getHotInstance(ctx: Context, opts: RegistryOpts, typeKey: string): unknown;

  setHotInstance(ctx: Context, opts: RegistryOpts, typeKey: string, instance: unknown): void;

  /**
   * Run `build` at most once at a time per `cacheKey`. Callers arriving
   * while a build is in flight share its result; a failed build releases
   * the key so a later call may retry.
   *
   * `trail` is the caller's construction trail. Its last key is the build
   * that waits on `cacheKey`; joining a build that already waits on it,
   * directly or through other builds, rejects with CircularDependencyError.
   */
  construct(
    cacheKey: string,
    build: () => Promise<unknown>,
    trail?: readonly string[]
  ): Promise<unknown>;
}

/**
 * Options for {@link DIRegistry}.
 */
export interface RegistryOptions {
  /** Name used in log records. Defaults to `'Registry'`. */
  name?: string;

  /** Receives registration, construction and creation records. Silent by default. */
  logger?: Logger;

  /** Called after every successful construction with its duration. */
  onInstantiate?: (cacheKey: string, durationNs: number) => void;
}

/**
 * Cache key of a hot instance: `typeKey`, or `token:typeKey` when the
 * active options carry a token.
 */
export function hotInstanceKey(opts: Pick<RegistryOpts, 'injectionToken'>, typeKey: string): string {
  return deriveTypeKey(typeKey, opts.injectionToken);
}

const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

const toNs = (ms: number) => Math.round(ms * 1_000_000);

/**
 * In-memory {@link Registry}.
 *
 * @example
 * ```typescript
 * const registry = new DIRegistry({ name: 'test', logger: new ConsoleLogger() });
 * register(Clock, () => new SystemClock(), withRegistry(registry));
 * ```
 */
export class DIRegistry implements Registry {
  readonly name: string;
  readonly logger: Logger;

  private readonly registrations = new Map<string, Registration<InstanceFactory>>();
  private readonly configurationRegistrations = new Map<
    string,
    Registration<ConfigurationFactory>
  >();
  private readonly hotInstances = new Map<string, unknown>();
  private readonly inFlight = new Map<string, Promise<unknown>>();
  /** waiting build key -> awaited key -> number of pending awaits */
  private readonly waits = new Map<string, Map<string, number>>();
  private readonly instantiateHook?: (cacheKey: string, durationNs: number) => void;

  constructor(options: RegistryOptions = {}) {
    this.name = options.name ?? 'Registry';
    this.logger = options.logger ?? new NullLogger();
    this.instantiateHook = options.onInstantiate;
  }

  register(typeKey: string, factory: InstanceFactory, opts: RegistryOpts): void {
    if (this.registrations.has(typeKey)) {
      this.logger.debug('replacing registration', { registry: this.name, typeKey });
    }
    this.registrations.set(typeKey, { factory, opts: { ...opts } });
  }

  registerConfiguration(typeKey: string, factory: ConfigurationFactory, opts: RegistryOpts): void {
    if (this.configurationRegistrations.has(typeKey)) {
      this.logger.debug('replacing configuration registration', { registry: this.name, typeKey });
    }
    this.configurationRegistrations.set(typeKey, { factory, opts: { ...opts } });
  }

  async create(
    ctx: Context,
    typeKey: string,
    config: unknown,
    opts: RegistryOpts
  ): Promise<unknown> {
    const reg = this.registrations.get(typeKey);
    if (!reg) {
      throw new DependencyMissingError(typeKey, 'instance', this.registeredKeys());
    }

    return reg.factory(ctx, opts, config);
  }

  async createConfiguration(ctx: Context, typeKey: string, opts: RegistryOpts): Promise<unknown> {
    const reg = this.configurationRegistrations.get(typeKey);
    if (!reg) {
      throw new DependencyMissingError(
        typeKey,
        'configuration',
        [...this.configurationRegistrations.keys()]
      );
    }

    return reg.factory(ctx, opts);
  }

  getHotInstance(_ctx: Context, opts: RegistryOpts, typeKey: string): unknown {
    const key = hotInstanceKey(opts, typeKey);
    if (!this.hotInstances.has(key)) {
      throw new DependencyMissingError(key, 'hot-instance');
    }

    return this.hotInstances.get(key);
  }

  setHotInstance(_ctx: Context, opts: RegistryOpts, typeKey: string, instance: unknown): void {
    this.hotInstances.set(hotInstanceKey(opts, typeKey), instance);
  }

  construct(
    cacheKey: string,
    build: () => Promise<unknown>,
    trail: readonly string[] = []
  ): Promise<unknown> {
    const waiter: string | undefined = trail[trail.length - 1];
    const pending = this.inFlight.get(cacheKey);
    if (pending) {
      const cycle = waiter === undefined ? undefined : this.waitPath(cacheKey, waiter);
      if (cycle) {
        return Promise.reject(new CircularDependencyError([...cycle.slice(-1), ...cycle]));
      }

      this.logger.debug('awaiting in-flight construction', { registry: this.name, cacheKey });
      return this.track(waiter, cacheKey, pending);
    }

    const started = nowMs();
    const promise = Promise.resolve()
      .then(build)
      .then((value) => {
        this.inFlight.delete(cacheKey);
        const durationNs = toNs(nowMs() - started);
        this.logger.debug('constructed', { registry: this.name, cacheKey, durationNs });
        this.instantiateHook?.(cacheKey, durationNs);
        return value;
      })
      .catch((err: unknown) => {
        // Release the key so a later call can retry.
        this.inFlight.delete(cacheKey);
        throw err;
      });

    this.inFlight.set(cacheKey, promise);
    return this.track(waiter, cacheKey, promise);
  }

  /** Record that the build `waiter` awaits `cacheKey` until `promise` settles. */
  private track(
    waiter: string | undefined,
    cacheKey: string,
    promise: Promise<unknown>
  ): Promise<unknown> {
    if (waiter === undefined) return promise;

    const edges = this.waits.get(waiter) ?? new Map<string, number>();
    edges.set(cacheKey, (edges.get(cacheKey) ?? 0) + 1);
    this.waits.set(waiter, edges);

    return promise.finally(() => {
      const count = (edges.get(cacheKey) ?? 1) - 1;
      if (count > 0) {
        edges.set(cacheKey, count);
        return;
      }
      edges.delete(cacheKey);
      if (edges.size === 0 && this.waits.get(waiter) === edges) this.waits.delete(waiter);
    });
  }

  /** Keys from `from` to `to` along pending awaits, or undefined when `to` is unreachable. */
  private waitPath(from: string, to: string): string[] | undefined {
    const visited = new Set<string>();
    const walk = (key: string): string[] | undefined => {
      if (key === to) return [key];
      if (visited.has(key)) return undefined;
      visited.add(key);

      for (const next of this.waits.get(key)?.keys() ?? []) {
        const rest = walk(next);
        if (rest) return [key, ...rest];
      }
      return undefined;
    };
    return walk(from);
  }

  // ---- introspection ----

  isRegistered(typeKey: string): boolean {
    return this.registrations.has(typeKey);
  }

  isConfigurationRegistered(typeKey: string): boolean {
    return this.configurationRegistrations.has(typeKey);
  }

  registeredKeys(): string[] {
    return [...this.registrations.keys()];
  }

  hotInstanceKeys(): string[] {
    return [...this.hotInstances.keys()];
  }
}

const GLOBAL_SYMBOL = Symbol.for('wirecfg.di.globalRegistry');

function isRegistry(value: unknown): value is Registry {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'register') === 'function' &&
    typeof Reflect.get(value, 'construct') === 'function'
  );
}

/**
 * Process-wide registry used when no `withRegistry` option is given.
 *
 * Stored on `globalThis` so that duplicated copies of this module share it.
 */
export function globalRegistry(): Registry {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isRegistry(existing)) return existing;

  const created = new DIRegistry({ name: 'global' });
  Reflect.set(globalThis, GLOBAL_SYMBOL, created);
  return created;
}

/**
 * Replace the process-wide registry. Intended for tests.
 */
export function setGlobalRegistry(registry: Registry): void {
  Reflect.set(globalThis, GLOBAL_SYMBOL, registry);
}
