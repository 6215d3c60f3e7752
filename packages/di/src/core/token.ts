import { InvalidInjectionTokenError } from '../errors/errors.js';

/**
 * Branded type for validated injection tokens.
 * Prevents accidental use of raw strings where a registered token is expected.
 */
export type InjectionToken = string & { __brand: 'InjectionToken' };

/** Segment separator inside a token and inside configuration paths. */
export const TOKEN_SEPARATOR = '.';

/**
 * Every token registered in this process. Tokens are never unregistered
 * outside of tests.
 */
const registeredTokens = new Set<string>();

/**
 * Register a new injection token.
 *
 * Tokens distinguish several bindings of the same type and double as the
 * leading segment of configuration lookup paths, so they follow the same
 * dot-segmented shape as those paths.
 *
 * @throws InvalidInjectionTokenError when the token is empty, starts or ends
 *         with a dot, contains consecutive dots, or was already registered
 *
 * @example
 * ```typescript
 * export const PrimaryDb = registerInjectionToken('databases.primary');
 * ```
 */
export function registerInjectionToken(raw: string): InjectionToken {
  if (registeredTokens.has(raw)) {
    throw new InvalidInjectionTokenError(raw, 'already-registered');
  }

  if (raw === '') {
    throw new InvalidInjectionTokenError(raw, 'empty');
  }

  if (raw.startsWith(TOKEN_SEPARATOR)) {
    throw new InvalidInjectionTokenError(raw, 'leading-dot');
  }

  if (raw.endsWith(TOKEN_SEPARATOR)) {
    throw new InvalidInjectionTokenError(raw, 'trailing-dot');
  }

  if (raw.includes(TOKEN_SEPARATOR + TOKEN_SEPARATOR)) {
    throw new InvalidInjectionTokenError(raw, 'consecutive-dots');
  }

  registeredTokens.add(raw);
  return raw as InjectionToken;
}

/**
 * Check whether a raw string has been registered as a token.
 */
export function isInjectionTokenRegistered(raw: string): raw is InjectionToken {
  return registeredTokens.has(raw);
}

/**
 * Forget every registered token.
 *
 * @internal Test isolation only. Production code never unregisters tokens.
 */
export function resetInjectionTokensForTests(): void {
  registeredTokens.clear();
}
