import { encodeConfiguration } from '../config/decode.js';
import { ExecutionContext } from './execution.js';
import type { InjectionToken } from './token.js';

/**
 * Generic, fully templated configuration tree.
 */
export type ConfigRawData = Record<string, unknown>;

/**
 * Typed configuration source. Anything able to resolve a dot-separated
 * path to a node can back a Context; {@link lookupNode} is the default
 * implementation such types delegate to.
 */
export interface Configuration {
  lookupNode(path: string): unknown;
}

/**
 * Values accepted by {@link newContext}. Each argument is classified by
 * what it is, not by position.
 */
export type ContextArg = Context | ExecutionContext | AbortSignal | Configuration | ConfigRawData;

export function isConfiguration(value: unknown): value is Configuration {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'lookupNode') === 'function'
  );
}

/**
 * State carried through a creation call and every nested creation it
 * triggers: the configuration tree, the breadcrumb trail of injection
 * tokens, the cache keys currently under construction and the execution
 * context (cancellation, deadline, values).
 *
 * Creation clones the Context on entry, so breadcrumbs pushed while
 * building one dependency never leak into its siblings.
 */
export class Context {
  /** @internal use {@link newContext} */
  constructor(
    private readonly executionCtx: ExecutionContext,
    private readonly rawCfg: ConfigRawData,
    private readonly cfg: Configuration | undefined,
    private readonly trail: string[] = [],
    private readonly constructing: string[] = []
  ) {}

  /** Push a token onto the breadcrumb trail. Empty tokens are ignored. */
  appendBreadcrumb(token: InjectionToken | ''): void {
    if (token.length === 0) return;
    this.trail.push(token);
  }

  breadcrumbs(): readonly string[] {
    return this.trail;
  }

  rawConfiguration(): ConfigRawData {
    return this.rawCfg;
  }

  configuration(): Configuration | undefined {
    return this.cfg;
  }

  inner(): ExecutionContext {
    return this.executionCtx;
  }

  /**
   * Copy sharing the configuration and execution context, with its own
   * breadcrumb trail and construction trail.
   */
  clone(): Context {
    return new Context(
      this.executionCtx,
      this.rawCfg,
      this.cfg,
      [...this.trail],
      [...this.constructing]
    );
  }

  // ---- construction trail ----

  /** @internal */
  isConstructing(cacheKey: string): boolean {
    return this.constructing.includes(cacheKey);
  }

  /** @internal */
  enterConstruction(cacheKey: string): void {
    this.constructing.push(cacheKey);
  }

  /** Cache keys being constructed by enclosing factories, outermost first. */
  constructionTrail(): readonly string[] {
    return this.constructing;
  }

  // ---- execution context ----

  get signal(): AbortSignal {
    return this.executionCtx.signal;
  }

  deadline(): Date | undefined {
    return this.executionCtx.deadline();
  }

  err(): unknown {
    return this.executionCtx.err();
  }

  value(key: unknown): unknown {
    return this.executionCtx.value(key);
  }
}

/**
 * Build a Context from any mix of a parent Context, an ExecutionContext or
 * AbortSignal, a typed {@link Configuration} and a raw tree.
 *
 * Values missing from the arguments are inherited from the parent. When a
 * typed configuration is present the raw tree is derived from it.
 *
 * @example
 * ```typescript
 * const root = newContext(appConfig);
 * const perRequest = newContext(root, request.signal);
 * ```
 */
export function newContext(...args: ContextArg[]): Context {
  let parent: Context | undefined;
  let execution: ExecutionContext | undefined;
  let raw: ConfigRawData | undefined;
  let cfg: Configuration | undefined;

  for (const arg of args) {
    if (arg instanceof Context) parent = arg;
    else if (arg instanceof ExecutionContext) execution = arg;
    else if (arg instanceof AbortSignal) execution = ExecutionContext.fromSignal(arg);
    else if (isConfiguration(arg)) cfg = arg;
    else raw = arg;
  }

  if (parent) {
    raw ??= parent.rawConfiguration();
    cfg ??= parent.configuration();
    execution ??= parent.inner();
  }

  execution ??= ExecutionContext.background();

  if (cfg) {
    raw = encodeConfiguration(cfg);
  }

  return new Context(execution, raw ?? {}, cfg);
}
