import { describe, expect, it } from 'vitest';

import {
  buildRegistryOpts,
  withBreadcrumbPath,
  withConfigNode,
  withConfiguration,
  withOpts,
  withRegistry,
  withToken,
} from '../src/core/options.js';
import { DIRegistry } from '../src/core/registry.js';
import { registerInjectionToken } from '../src/core/token.js';

const Primary = registerInjectionToken('options.primary');

describe('buildRegistryOpts()', () => {
  it('starts from the default registry with no token or path', () => {
    const registry = new DIRegistry();
    const opts = buildRegistryOpts(registry, []);

    expect(opts.registry).toBe(registry);
    expect(opts.injectionToken).toBe('');
    expect(opts.configNodePath).toBe('');
    expect(opts.configuration).toBeUndefined();
  });

  it('applies mutators in order and skips undefined ones', () => {
    const fallback = new DIRegistry();
    const isolated = new DIRegistry();

    const opts = buildRegistryOpts(fallback, [
      withRegistry(isolated),
      undefined,
      withToken(Primary),
      withConfiguration({ port: 1 }),
      withBreadcrumbPath(),
    ]);

    expect(opts.registry).toBe(isolated);
    expect(opts.injectionToken).toBe('options.primary');
    expect(opts.configuration).toEqual({ port: 1 });
    expect(opts.breadcrumbPath).toBe(true);
  });
});

describe('withConfigNode()', () => {
  it('nests repeated fragments with a dot', () => {
    const opts = buildRegistryOpts(new DIRegistry(), [
      withConfigNode('a'),
      withConfigNode('b.c'),
    ]);

    expect(opts.configNodePath).toBe('a.b.c');
  });
});

describe('withOpts()', () => {
  it('replaces every field, including ones the source leaves unset', () => {
    const registry = new DIRegistry();
    const source = buildRegistryOpts(registry, [withConfigNode('db')]);

    const opts = buildRegistryOpts(new DIRegistry(), [
      withToken(Primary),
      withConfiguration('stale'),
      withOpts(source),
    ]);

    expect(opts.registry).toBe(registry);
    expect(opts.injectionToken).toBe('');
    expect(opts.configNodePath).toBe('db');
    expect(opts.configuration).toBeUndefined();
  });

  it('does not forward a pre-resolved configuration', () => {
    const source = buildRegistryOpts(new DIRegistry(), [
      withToken(Primary),
      withConfiguration({ url: 'postgres://primary' }),
    ]);

    const opts = buildRegistryOpts(new DIRegistry(), [withOpts(source)]);

    expect(opts.injectionToken).toBe(Primary);
    expect(opts.configuration).toBeUndefined();
  });

  it('can be followed by further mutators', () => {
    const source = buildRegistryOpts(new DIRegistry(), [withConfigNode('db')]);
    const opts = buildRegistryOpts(new DIRegistry(), [withOpts(source), withConfigNode('pool')]);

    expect(opts.configNodePath).toBe('db.pool');
    expect(source.configNodePath).toBe('db');
  });
});
