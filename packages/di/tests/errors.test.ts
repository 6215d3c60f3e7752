import { describe, expect, it } from 'vitest';

import {
  CircularDependencyError,
  ConfigurationLookupError,
  DIErrorCode,
  DependencyCreationError,
  DependencyMissingError,
  DependencyTypeMismatchError,
  InvalidInjectionTokenError,
  StructDecodeError,
  TemplateResolutionError,
} from '../src/errors/errors.js';

describe('error classes', () => {
  it('describes rejected injection tokens', () => {
    const empty = new InvalidInjectionTokenError('', 'empty');
    expect(empty.code).toBe(DIErrorCode.InvalidInjectionToken);
    expect(empty.name).toBe('InvalidInjectionTokenError');
    expect(empty.message.split('\n')[2]).toBe('  Injection token cannot be empty.');

    const dots = new InvalidInjectionTokenError('a..b', 'consecutive-dots');
    expect(dots.token).toBe('a..b');
    expect(dots.reason).toBe('consecutive-dots');
    expect(dots.message).toContain("Injection token 'a..b' cannot contain consecutive dots.");
  });

  it('lists registered keys on a missing dependency', () => {
    const err = new DependencyMissingError('Clock', 'instance', ['Database', 'primary:Database']);

    expect(err.typeKey).toBe('Clock');
    expect(err.namespace).toBe('instance');
    const lines = err.message.split('\n');
    expect(lines[0]).toBe('Dependency not registered: Clock');
    expect(lines.slice(2, 5)).toEqual(['Registered keys:', '  - Database', '  - primary:Database']);
    expect(err.message).toContain('To fix this:');
  });

  it('summarises long key lists and omits hints for hot instances', () => {
    const many = new DependencyMissingError('X', 'configuration', new Array(11).fill('k'));
    expect(many.message.split('\n')[0]).toBe('Configuration dependency not registered: X');
    expect(many.message).toContain('11 keys are registered.');

    const hot = new DependencyMissingError('X', 'hot-instance');
    expect(hot.message).toBe('No hot instance found: X\n');
  });

  it('wraps creation failures with their breadcrumbs', () => {
    const cause = new Error('connection refused\nstack detail');
    const err = new DependencyCreationError('Database', 'primary', ['api', 'primary'], cause);

    expect(err.cause).toBe(cause);
    expect(err.typeName).toBe('Database');
    expect(err.token).toBe('primary');
    expect(err.message).toContain("Failed to create dependency 'primary:Database'");
    expect(err.message).toContain('  Breadcrumbs: api → primary');
    expect(err.message).toContain('  Cause: connection refused\n');
  });

  it('marks root creation failures and describes non-Error causes', () => {
    const err = new DependencyCreationError('Clock', '', [], { reason: 'offline' });

    expect(err.message).toContain("Failed to create dependency 'Clock'");
    expect(err.message).toContain('  Breadcrumbs: (root)');
    expect(err.message).toContain('  Cause: {"reason":"offline"}');
  });

  it('marks type mismatches as fatal', () => {
    const err = new DependencyTypeMismatchError('primary:Clock', 'Clock', 'string');

    expect(err.fatal).toBe(true);
    expect(err.code).toBe(DIErrorCode.DependencyTypeMismatch);
    expect(err.message).toContain('  Key:      primary:Clock');
    expect(err.message).toContain('  Expected: Clock');
    expect(err.message).toContain('  Received: string');
  });

  it('describes each lookup failure', () => {
    const cases: Array<[ConfigurationLookupError, string]> = [
      [
        new ConfigurationLookupError('empty-path', ''),
        'Lookup path cannot be empty: injection token and config node path are both empty.',
      ],
      [new ConfigurationLookupError('nil-in-path', 'a.b', 'b'), "Nil value encountered in path at 'b'."],
      [
        new ConfigurationLookupError('not-navigable', 'a.b', 'b'),
        "Cannot access field 'b' on a non-object value.",
      ],
      [new ConfigurationLookupError('field-not-found', 'a.b', 'b'), "Field 'b' not found."],
      [
        new ConfigurationLookupError('missing-configuration', ''),
        'Context has no typed configuration to look up.',
      ],
      [
        new ConfigurationLookupError('invalid-type', 'a.b'),
        "Configuration node 'a.b' has an invalid type.",
      ],
    ];

    for (const [err, summary] of cases) {
      expect(err.message.split('\n')[2]).toBe(`  ${summary}`);
    }
  });

  it('keeps the lookup cause when one is given', () => {
    const cause = new Error('boom');
    expect(new ConfigurationLookupError('field-not-found', 'a', 'a', cause).cause).toBe(cause);
    expect(new ConfigurationLookupError('field-not-found', 'a', 'a').cause).toBeUndefined();
  });

  it('describes template failures', () => {
    const malformed = new TemplateResolutionError('malformed-document', undefined, new SyntaxError('bad'));
    expect(malformed.message.split('\n')[0]).toBe(
      'Failed to parse configuration document for reference resolution.'
    );
    expect(malformed.message).toContain('  Cause: bad');

    const unresolved = new TemplateResolutionError('unresolvable-reference', '${di.missing}');
    expect(unresolved.placeholder).toBe('${di.missing}');
    expect(unresolved.message.split('\n')[0]).toBe('Failed to resolve reference ${di.missing}.');
  });

  it('prints the cycle', () => {
    const err = new CircularDependencyError(['A', 'B', 'A']);

    expect(err.cycle).toEqual(['A', 'B', 'A']);
    expect(err.message).toContain('  A → B → A');
    expect(err.message).toContain('This means A depends on itself through other factories.');
  });

  it('names the field that failed to decode', () => {
    const err = new StructDecodeError('pool.lastReset', 'invalid timestamp "x"');

    expect(err.field).toBe('pool.lastReset');
    expect(err.detail).toBe('invalid timestamp "x"');
    expect(err.message).toContain('  Field:  pool.lastReset');
  });
});
