const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Stable error codes attached to every container error.
 */
export const DIErrorCode = {
  InvalidInjectionToken: 'DI_INVALID_INJECTION_TOKEN',
  DependencyMissing: 'DI_DEPENDENCY_MISSING',
  DependencyCreation: 'DI_DEPENDENCY_CREATION',
  DependencyTypeMismatch: 'DI_DEPENDENCY_TYPE_MISMATCH',
  ConfigurationLookup: 'DI_CONFIGURATION_LOOKUP',
  TemplateResolution: 'DI_TEMPLATE_RESOLUTION',
  CircularDependency: 'DI_CIRCULAR_DEPENDENCY',
  StructDecode: 'DI_STRUCT_DECODE',
} as const;

export type DIErrorCode = (typeof DIErrorCode)[keyof typeof DIErrorCode];

export type InvalidInjectionTokenReason =
  | 'empty'
  | 'leading-dot'
  | 'trailing-dot'
  | 'consecutive-dots'
  | 'already-registered';

const TOKEN_REASONS: Record<InvalidInjectionTokenReason, string> = {
  empty: 'injection token cannot be empty',
  'leading-dot': 'cannot start with a dot',
  'trailing-dot': 'cannot end with a dot',
  'consecutive-dots': 'cannot contain consecutive dots',
  'already-registered': 'is already registered',
};

/**
 * Injection token rejected at registration time.
 */
export class InvalidInjectionTokenError extends Error {
  readonly code = DIErrorCode.InvalidInjectionToken;

  constructor(
    public token: string,
    public reason: InvalidInjectionTokenReason
  ) {
    const summary =
      reason === 'empty'
        ? 'Injection token cannot be empty.'
        : `Injection token '${token}' ${TOKEN_REASONS[reason]}.`;
    const dev = [
      'Invalid injection token',
      '',
      `  ${summary}`,
      '',
      'Tokens are dot-segmented identifiers such as "payments.cache".',
      'Each token can be registered once per process; keep the returned value',
      'in a shared module and import it where needed.',
    ];
    super(format(summary, dev));
    this.name = 'InvalidInjectionTokenError';
  }
}

export type DependencyNamespace = 'instance' | 'configuration' | 'hot-instance';

/**
 * No factory (or cached hot instance) is bound to a type key.
 *
 * The creation pipeline treats this error as recoverable: a token-qualified
 * miss is retried once against the unqualified key.
 */
export class DependencyMissingError extends Error {
  readonly code = DIErrorCode.DependencyMissing;

  constructor(
    public typeKey: string,
    public namespace: DependencyNamespace,
    public registeredKeys: string[] = []
  ) {
    const what =
      namespace === 'configuration'
        ? 'configuration dependency not registered'
        : namespace === 'hot-instance'
          ? 'no hot instance found'
          : 'dependency not registered';
    const parts: string[] = [`${capitalize(what)}: ${typeKey}`, ''];

    if (registeredKeys.length > 0 && registeredKeys.length <= 10) {
      parts.push('Registered keys:');
      registeredKeys.forEach((k) => parts.push(`  - ${k}`));
      parts.push('');
    } else if (registeredKeys.length > 10) {
      parts.push(`${registeredKeys.length} keys are registered.`, '');
    }

    if (namespace !== 'hot-instance') {
      parts.push(
        'To fix this:',
        `  1. Register a factory for the type before creating it`,
        `  2. Check that the same registry is passed to register and create (withRegistry)`,
        `  3. Check the injection token used on both sides`,
        ''
      );
    }

    super(format(`${what}: ${typeKey}`, parts));
    this.name = 'DependencyMissingError';
  }
}

/**
 * Creation failed for a reason other than a type mismatch.
 */
export class DependencyCreationError extends Error {
  readonly code = DIErrorCode.DependencyCreation;

  constructor(
    public typeName: string,
    public token: string,
    public breadcrumbs: string[],
    cause: unknown
  ) {
    const target = token ? `${token}:${typeName}` : typeName;
    const trail = breadcrumbs.length > 0 ? breadcrumbs.join(' → ') : '(root)';
    const dev = [
      `Failed to create dependency '${target}'`,
      '',
      `  Breadcrumbs: ${trail}`,
      `  Cause: ${describeCause(cause)}`,
      '',
      "See 'cause' for the underlying error.",
    ];
    super(format(`Failed to create dependency '${target}'.`, dev), { cause });
    this.name = 'DependencyCreationError';
  }
}

/**
 * A created value does not match the requested type.
 *
 * This signals a wiring bug. The creation pipeline never wraps it in a
 * {@link DependencyCreationError}; callers are not expected to recover.
 */
export class DependencyTypeMismatchError extends Error {
  readonly code = DIErrorCode.DependencyTypeMismatch;
  readonly fatal = true;

  constructor(
    public typeKey: string,
    public expected: string,
    public received: string
  ) {
    const dev = [
      'Failed to cast dependency to expected type',
      '',
      `  Key:      ${typeKey}`,
      `  Expected: ${expected}`,
      `  Received: ${received}`,
      '',
      'The factory registered under this key returns a value of another type.',
      'Check the type passed to register() against the one passed to create().',
    ];
    super(format(`Failed to cast dependency to expected type (${typeKey}).`, dev));
    this.name = 'DependencyTypeMismatchError';
  }
}

export type ConfigurationLookupReason =
  | 'empty-path'
  | 'nil-in-path'
  | 'not-navigable'
  | 'field-not-found'
  | 'missing-configuration'
  | 'invalid-type';

/**
 * A configuration node could not be located or narrowed.
 */
export class ConfigurationLookupError extends Error {
  readonly code = DIErrorCode.ConfigurationLookup;

  constructor(
    public reason: ConfigurationLookupReason,
    public path: string,
    public segment?: string,
    cause?: unknown
  ) {
    const summary = describeLookup(reason, path, segment);
    const dev = [
      'Configuration lookup failed',
      '',
      `  ${summary}`,
      ...(path ? ['', `  Path: ${path}`] : []),
    ];
    super(format(summary, dev), cause === undefined ? undefined : { cause });
    this.name = 'ConfigurationLookupError';
  }
}

export type TemplateResolutionReason = 'malformed-document' | 'unresolvable-reference';

/**
 * A `${di.path}` placeholder could not be expanded, or the document could
 * not be parsed.
 */
export class TemplateResolutionError extends Error {
  readonly code = DIErrorCode.TemplateResolution;

  constructor(
    public reason: TemplateResolutionReason,
    public placeholder?: string,
    cause?: unknown
  ) {
    const summary =
      reason === 'malformed-document'
        ? 'Failed to parse configuration document for reference resolution.'
        : `Failed to resolve reference ${placeholder ?? ''}.`;
    const dev = [
      summary,
      '',
      ...(cause !== undefined ? [`  Cause: ${describeCause(cause)}`, ''] : []),
      'References are written as ${di.path.to.node} and must point at a node',
      'that exists in the same document, usually under "$shared".',
    ];
    super(format(summary, dev), cause === undefined ? undefined : { cause });
    this.name = 'TemplateResolutionError';
  }
}

/**
 * A factory requires its own cache key through nested creation calls.
 */
export class CircularDependencyError extends Error {
  readonly code = DIErrorCode.CircularDependency;

  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const dev = [
      'Circular dependency detected:',
      '',
      `  ${cycleStr}`,
      '',
      `This means ${cycle[cycle.length - 1]} depends on itself through other factories.`,
      '',
      'Solutions:',
      `  1. Extract shared logic into a separate dependency`,
      `  2. Create the dependency lazily instead of inside the factory`,
    ];
    super(format(`Circular dependency detected: ${cycleStr}`, dev));
    this.name = 'CircularDependencyError';
  }
}

/**
 * A generic configuration value could not be mapped into its destination.
 */
export class StructDecodeError extends Error {
  readonly code = DIErrorCode.StructDecode;

  constructor(
    public field: string,
    public detail: string
  ) {
    super(format(`Failed to decode '${field}': ${detail}`, [
      'Failed to decode configuration',
      '',
      `  Field:  ${field}`,
      `  Detail: ${detail}`,
      '',
      'Time values are encoded as {"RFC3339": "<timestamp>"} or an RFC 3339 string.',
    ]));
    this.name = 'StructDecodeError';
  }
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message.split('\n')[0] ?? cause.name;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}

function describeLookup(
  reason: ConfigurationLookupReason,
  path: string,
  segment?: string
): string {
  switch (reason) {
    case 'empty-path':
      return 'Lookup path cannot be empty: injection token and config node path are both empty.';
    case 'nil-in-path':
      return `Nil value encountered in path at '${segment ?? ''}'.`;
    case 'not-navigable':
      return `Cannot access field '${segment ?? ''}' on a non-object value.`;
    case 'field-not-found':
      return `Field '${segment ?? ''}' not found.`;
    case 'missing-configuration':
      return 'Context has no typed configuration to look up.';
    case 'invalid-type':
      return `Configuration node '${path}' has an invalid type.`;
  }
}
