import { ConfigurationLookupError } from '../errors/errors.js';
import type { Context } from '../core/context.js';
import { buildRegistryOpts, type RegistryOpts, type RegistryOption } from '../core/options.js';
import { globalRegistry } from '../core/registry.js';
import { TOKEN_SEPARATOR } from '../core/token.js';
import { Ref, safeTypeAssert, type TypeRef } from '../core/type-ref.js';
import { ConfigAliasRegistry } from './aliases.js';

/**
 * Build the configuration lookup path for `opts`: `token.fragment` when a
 * token is set, otherwise the fragment alone.
 *
 * @throws ConfigurationLookupError (`empty-path`) when both are empty
 *
 * @example
 * ```typescript
 * assemblePath({ injectionToken: 'a', configNodePath: 'b.c' }); // 'a.b.c'
 * assemblePath({ injectionToken: '', configNodePath: 'x' });    // 'x'
 * ```
 */
export function assemblePath(
  opts: Pick<RegistryOpts, 'injectionToken' | 'configNodePath'>
): string {
  if (opts.injectionToken.length === 0 && opts.configNodePath.length === 0) {
    throw new ConfigurationLookupError('empty-path', '');
  }

  const path =
    opts.injectionToken.length > 0
      ? opts.injectionToken + TOKEN_SEPARATOR + opts.configNodePath
      : opts.configNodePath;

  if (path.length === 0) {
    throw new ConfigurationLookupError('empty-path', '');
  }

  return path;
}

function isNavigable(value: object): boolean {
  return !(Array.isArray(value) || value instanceof Date || value instanceof Map);
}

function resolveSegment(node: object, segment: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(node, segment)) return segment;
  return ConfigAliasRegistry.propertyForAlias(node, segment);
}

/**
 * Walk `root` along the dot-separated `path`.
 *
 * Each segment matches an own property by name, then a property declared
 * with that `@ConfigKey` alias. {@link Ref} wrappers along the way are
 * dereferenced. An empty path returns `root`.
 *
 * @throws ConfigurationLookupError with reason `nil-in-path`,
 *         `not-navigable` or `field-not-found`
 */
export function lookupNode(root: unknown, path: string): unknown {
  if (path === '') return root;

  let current: unknown = root;
  for (const segment of path.split(TOKEN_SEPARATOR)) {
    if (current instanceof Ref) {
      current = current.value;
    }

    if (current === null || current === undefined) {
      throw new ConfigurationLookupError('nil-in-path', path, segment);
    }

    if (typeof current !== 'object' || !isNavigable(current)) {
      throw new ConfigurationLookupError('not-navigable', path, segment);
    }

    const property = resolveSegment(current, segment);
    if (property === undefined) {
      throw new ConfigurationLookupError('field-not-found', path, segment);
    }

    current = Reflect.get(current, property);
  }

  return current;
}

/**
 * Locate the configuration node for the current call and narrow it to `type`.
 *
 * A configuration supplied through `withConfiguration` is used as is.
 * Otherwise the path is assembled from the options (prefixed with the
 * Context's breadcrumbs under `withBreadcrumbPath()`) and resolved through
 * the Context's typed configuration.
 *
 * @throws ConfigurationLookupError
 *
 * @example
 * ```typescript
 * registerConfiguration(DbConfig, (ctx, opts) =>
 *   configurationLookup(ctx, DbConfig, withOpts(opts), withConfigNode('db'))
 * );
 * ```
 */
export function configurationLookup<T>(
  ctx: Context,
  type: TypeRef<T>,
  ...options: Array<RegistryOption | undefined>
): T {
  const opts = buildRegistryOpts(globalRegistry(), options);

  if (opts.configuration !== undefined) {
    return narrow(opts.configuration, type, '');
  }

  const cfg = ctx.configuration();
  if (!cfg) {
    throw new ConfigurationLookupError('missing-configuration', '');
  }

  let path = assemblePath(opts);
  if (opts.breadcrumbPath) {
    const prefix = [...ctx.breadcrumbs()];
    // The innermost breadcrumb is the active token, already leading the path.
    if (prefix[prefix.length - 1] === opts.injectionToken) prefix.pop();
    if (prefix.length > 0) path = [...prefix, path].join(TOKEN_SEPARATOR);
  }

  let node: unknown;
  try {
    node = cfg.lookupNode(path);
  } catch (err) {
    if (err instanceof ConfigurationLookupError) throw err;
    throw new ConfigurationLookupError('field-not-found', path, undefined, err);
  }

  if (node === null || node === undefined) {
    throw new ConfigurationLookupError('nil-in-path', path, path.split(TOKEN_SEPARATOR).pop());
  }

  return narrow(node, type, path);
}

function narrow<T>(value: unknown, type: TypeRef<T>, path: string): T {
  const asserted = safeTypeAssert(value, type);
  if (!asserted.ok) {
    throw new ConfigurationLookupError('invalid-type', path);
  }
  return asserted.value;
}
