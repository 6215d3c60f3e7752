import type { Registry } from './registry.js';
import { TOKEN_SEPARATOR, type InjectionToken } from './token.js';

/**
 * Options threaded through every registration and creation call.
 *
 * Built fresh per call from the process-wide registry defaults and then
 * adjusted by {@link RegistryOption} mutators.
 */
export interface RegistryOpts {
  /** Registry used for registration and creation. */
  registry: Registry;

  /** Token selecting one of several bindings of the same type; '' for none. */
  injectionToken: InjectionToken | '';

  /** Dot-separated path fragment appended after the token when looking up configuration. */
  configNodePath: string;

  /**
   * Pre-resolved configuration. When set, configuration lookup and the
   * configuration side of `createPair` are skipped and this value is used.
   */
  configuration?: unknown;

  /** Prefix configuration lookups with the Context's breadcrumb trail. */
  breadcrumbPath?: boolean;
}

/**
 * Small mutator applied to a {@link RegistryOpts} before a call runs.
 */
export type RegistryOption = (opts: RegistryOpts) => void;

/**
 * Build options for one call: defaults first, then each mutator in order.
 * `undefined` entries are skipped so call sites can pass conditional options.
 */
export function buildRegistryOpts(
  defaultRegistry: Registry,
  options: ReadonlyArray<RegistryOption | undefined>
): RegistryOpts {
  const opts: RegistryOpts = {
    registry: defaultRegistry,
    injectionToken: '',
    configNodePath: '',
  };

  for (const option of options) {
    option?.(opts);
  }

  return opts;
}

/**
 * Replace every option with a copy of `source`.
 *
 * A pre-resolved configuration belongs to the call it was passed to and is
 * cleared rather than copied; pass `withConfiguration` again to forward it.
 */
export function withOpts(source: RegistryOpts): RegistryOption {
  return (opts) => {
    opts.registry = source.registry;
    opts.injectionToken = source.injectionToken;
    opts.configNodePath = source.configNodePath;
    opts.configuration = undefined;
    opts.breadcrumbPath = source.breadcrumbPath;
  };
}

/**
 * Use `registry` instead of the process-wide one.
 */
export function withRegistry(registry: Registry): RegistryOption {
  return (opts) => {
    opts.registry = registry;
  };
}

/**
 * Select the binding registered under `token`.
 */
export function withToken(token: InjectionToken | ''): RegistryOption {
  return (opts) => {
    opts.injectionToken = token;
  };
}

/**
 * Append `path` to the configuration node path. Repeated calls nest:
 * `withConfigNode('a'), withConfigNode('b')` yields `a.b`.
 */
export function withConfigNode(path: string): RegistryOption {
  return (opts) => {
    if (opts.configNodePath.length > 0) {
      opts.configNodePath = opts.configNodePath + TOKEN_SEPARATOR + path;
      return;
    }

    opts.configNodePath = path;
  };
}

/**
 * Supply the configuration directly instead of looking it up.
 */
export function withConfiguration(configuration: unknown): RegistryOption {
  return (opts) => {
    opts.configuration = configuration;
  };
}

/**
 * Prefix configuration lookups with the Context's breadcrumbs.
 */
export function withBreadcrumbPath(enabled = true): RegistryOption {
  return (opts) => {
    opts.breadcrumbPath = enabled;
  };
}
