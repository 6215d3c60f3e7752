import { StructDecodeError } from '../errors/errors.js';
import { Ref, type Constructor } from '../core/type-ref.js';
import { ConfigAliasRegistry } from './aliases.js';

/** Key of the object a time value is encoded as: `{"RFC3339": "<timestamp>"}`. */
export const TIME_KEY = 'RFC3339';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isEncodedTime(value: unknown): value is { [TIME_KEY]: unknown } {
  return isPlainRecord(value) && Object.keys(value).length === 1 && TIME_KEY in value;
}

function encodeValue(value: unknown): unknown {
  if (value instanceof Ref) return encodeValue(value.value);
  if (value instanceof Date) return { [TIME_KEY]: value.toISOString() };
  if (Array.isArray(value)) return value.map(encodeValue);
  if (typeof value !== 'object' || value === null) return value;

  const out: Record<string, unknown> = {};
  for (const [property, field] of Object.entries(value)) {
    if (field === undefined || typeof field === 'function') continue;
    const key = ConfigAliasRegistry.aliasOf(value, property) ?? property;
    out[key] = encodeValue(field);
  }
  return out;
}

/**
 * Convert a configuration value into a generic tree.
 *
 * Declared aliases become keys, `Date` values become `{"RFC3339": iso}`,
 * {@link Ref} wrappers are dereferenced, methods and `undefined` fields are
 * dropped.
 *
 * @throws StructDecodeError when `value` does not encode to an object
 */
export function encodeConfiguration(value: unknown): Record<string, unknown> {
  const encoded = encodeValue(value);
  if (!isPlainRecord(encoded)) {
    throw new StructDecodeError('<root>', `expected an object, got ${describe(encoded)}`);
  }
  return encoded;
}

/** RFC 3339 date-time: `2024-03-07T10:00:00Z`, optional fraction, `Z` or a numeric offset. */
const RFC3339 = /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

function decodeTime(raw: unknown, field: string): Date {
  if (raw instanceof Date) return raw;

  const text = isEncodedTime(raw) ? raw[TIME_KEY] : raw;
  if (typeof text !== 'string') {
    throw new StructDecodeError(field, `expected a timestamp, got ${describe(text)}`);
  }

  const parsed = new Date(text);
  if (!RFC3339.test(text) || Number.isNaN(parsed.getTime())) {
    throw new StructDecodeError(field, `invalid timestamp "${text}"`);
  }
  return parsed;
}

function decodeField(raw: unknown, type: Constructor | undefined, field: string): unknown {
  if (type === Date) return decodeTime(raw, field);
  if (type) return decodeInto(raw, type, field);
  if (isEncodedTime(raw)) return decodeTime(raw, field);
  return raw;
}

function decodeInto<T>(raw: unknown, Class: Constructor<T>, path: string): T {
  if (!isPlainRecord(raw)) {
    throw new StructDecodeError(path || '<root>', `expected an object, got ${describe(raw)}`);
  }

  const target: T = new Class();
  if (typeof target !== 'object' || target === null) {
    throw new StructDecodeError(path || '<root>', `${Class.name} does not construct an object`);
  }

  const fields = ConfigAliasRegistry.fieldsOf(target);
  const properties = new Set([...Object.keys(target), ...fields.keys()]);

  for (const property of properties) {
    const meta = fields.get(property);
    const source =
      meta?.alias !== undefined && meta.alias in raw
        ? meta.alias
        : property in raw
          ? property
          : undefined;
    if (source === undefined) continue;

    const fieldPath = path ? `${path}.${property}` : property;
    const current: unknown = Reflect.get(target, property);
    const type = meta?.type?.() ?? (current instanceof Date ? Date : undefined);

    Reflect.set(target, property, decodeField(raw[source], type, fieldPath));
  }

  return target;
}

/**
 * Map a generic tree into a fresh instance of `Class`.
 *
 * Only properties the class declares (initialized fields, or fields
 * decorated with `@ConfigKey` / `@ConfigType`) are filled. A declared alias
 * takes precedence over the property name. Fields typed `Date` accept
 * `{"RFC3339": ...}` objects and RFC 3339 strings; nested classes are decoded
 * recursively.
 *
 * @throws StructDecodeError when `raw` or a nested field is not an object,
 *         or a time value cannot be parsed
 *
 * @example
 * ```typescript
 * const cfg = decodeConfiguration(JSON.parse(text), AppConfig);
 * ```
 */
export function decodeConfiguration<T>(raw: unknown, Class: Constructor<T>): T {
  return decodeInto(raw, Class, '');
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
