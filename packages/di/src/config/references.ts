import { ConfigurationLookupError, TemplateResolutionError } from '../errors/errors.js';
import type { ConfigRawData } from '../core/context.js';
import { TOKEN_SEPARATOR } from '../core/token.js';
import type { Constructor } from '../core/type-ref.js';
import { decodeConfiguration } from './decode.js';

/**
 * Conventional top-level section holding nodes meant to be referenced from
 * elsewhere in the document, e.g. `"${di.$shared.cache}"`.
 */
export const SHARED_SECTION = '$shared';

/** A placeholder with its optional surrounding quotes. Group 1: placeholder, group 2: path. */
const QUOTED_REFERENCE = /["']?(\$\{di\.([^}]+)\})["']?/g;

/** A bare placeholder used as a value. */
const BARE_REFERENCE = /:\s*(\$\{di\.[^}]+\})([,\s}])/g;

const REFERENCE = /\$\{di\.([^}]+)\}/g;

function isRecord(value: unknown): value is ConfigRawData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Quote bare placeholders so the document parses. */
function quoteBareReferences(text: string): string {
  return text.replace(BARE_REFERENCE, ': "$1"$2');
}

function parseObject(text: string): ConfigRawData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new TemplateResolutionError('malformed-document', undefined, err);
  }

  if (!isRecord(parsed)) {
    throw new TemplateResolutionError(
      'malformed-document',
      undefined,
      new TypeError('top-level value must be an object')
    );
  }
  return parsed;
}

/**
 * Walk `tree` along the dot-separated `path` through nested objects.
 * An empty path returns the tree.
 *
 * @throws ConfigurationLookupError (`field-not-found` or `not-navigable`)
 */
export function extractNodeFromPath(tree: ConfigRawData, path: string): unknown {
  if (path === '') return tree;

  const parts = path.split(TOKEN_SEPARATOR);
  let current: ConfigRawData = tree;

  for (const [i, part] of parts.entries()) {
    if (!Object.prototype.hasOwnProperty.call(current, part)) {
      throw new ConfigurationLookupError('field-not-found', path, part);
    }

    const value = current[part];
    if (i === parts.length - 1) return value;

    if (!isRecord(value)) {
      throw new ConfigurationLookupError('not-navigable', path, parts[i + 1]);
    }
    current = value;
  }

  return current;
}

/**
 * Distinct `${di.<path>}` placeholders in `text`, in order of first appearance.
 */
export function findReferences(text: string): string[] {
  return [...new Set(Array.from(text.matchAll(REFERENCE), (m) => m[0]))];
}

/**
 * Check that every placeholder in `text` resolves against `tree`.
 *
 * @throws TemplateResolutionError (`unresolvable-reference`) for the first
 *         placeholder that does not
 */
export function validateReferences(text: string, tree: ConfigRawData): void {
  for (const match of text.matchAll(REFERENCE)) {
    try {
      extractNodeFromPath(tree, match[1] ?? '');
    } catch (err) {
      throw new TemplateResolutionError('unresolvable-reference', match[0], err);
    }
  }
}

/**
 * Expand `${di.<path>}` placeholders in a JSON document.
 *
 * Placeholders may be quoted (`"${di.a.b}"`) or bare (`${di.a.b}`). Each is
 * replaced by the JSON text of the node at `<path>`, resolved against the
 * document with every placeholder read as `null`. Resolution is a single
 * pass: a placeholder pointing at another placeholder expands to `null`.
 *
 * Every placeholder is resolved before anything is substituted; on failure
 * the document is left untouched.
 *
 * @throws TemplateResolutionError with reason `malformed-document` or
 *         `unresolvable-reference`
 *
 * @example
 * ```typescript
 * resolveReferences('{"$shared":{"port":8080},"http":{"port":"${di.$shared.port}"}}');
 * // '{"$shared":{"port":8080},"http":{"port":8080}}'
 * ```
 */
export function resolveReferences(text: string): string {
  const normalized = quoteBareReferences(text);
  const skeleton = parseObject(normalized.replace(QUOTED_REFERENCE, 'null'));

  const replacements = new Map<string, string>();
  for (const match of text.matchAll(QUOTED_REFERENCE)) {
    const placeholder = match[1];
    const path = match[2];
    if (placeholder === undefined || path === undefined || replacements.has(placeholder)) {
      continue;
    }

    let node: unknown;
    try {
      node = extractNodeFromPath(skeleton, path);
    } catch (err) {
      throw new TemplateResolutionError('unresolvable-reference', placeholder, err);
    }

    replacements.set(placeholder, JSON.stringify(node) ?? 'null');
  }

  let result = normalized;
  for (const [placeholder, replacement] of replacements) {
    result = result.replaceAll(`"${placeholder}"`, () => replacement);
    result = result.replaceAll(placeholder, () => replacement);
  }

  return result;
}

/**
 * Expand placeholders and parse the document.
 *
 * @throws TemplateResolutionError
 */
export function parseConfigurationDocument(text: string): ConfigRawData {
  return parseObject(resolveReferences(text));
}

/**
 * Expand placeholders, parse the document and, when `Class` is given,
 * decode it into an instance of that class.
 *
 * @throws TemplateResolutionError, or StructDecodeError from the decoder
 */
export function unmarshalWithReferences(text: string): ConfigRawData;
export function unmarshalWithReferences<T>(text: string, Class: Constructor<T>): T;
export function unmarshalWithReferences<T>(
  text: string,
  Class?: Constructor<T>
): T | ConfigRawData {
  const tree = parseConfigurationDocument(text);
  return Class ? decodeConfiguration(tree, Class) : tree;
}
