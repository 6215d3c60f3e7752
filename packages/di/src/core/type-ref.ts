/**
 * Phantom type brand for compile-time type safety.
 * Associates a TypeRef with the value type it describes without runtime overhead.
 */
declare const TYPE_BRAND: unique symbol;

/**
 * Indirection wrapper around a value, the counterpart of a pointer.
 *
 * Factories may hand out either `T` or `Ref<T>`; creation coerces between
 * the two when the requested type differs only by this wrapper.
 */
export class Ref<T> {
  constructor(public value: T) {}
}

/**
 * Result of converting a value across the {@link Ref} wrapper.
 * `undefined` means the value is not of the same underlying type.
 */
export type Coerced<T> = { value: T } | undefined;

/**
 * Run-time stand-in for a static type.
 *
 * The registry indexes factories by string keys derived from `name`, so two
 * TypeRefs with the same name address the same bindings. A TypeRef and its
 * `ref()` share a name.
 *
 * @template T - The type of value this reference describes
 */
export interface TypeRef<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'type';

  /** Canonical type name used for key derivation */
  readonly name: string;

  /** True when values are expected behind a {@link Ref} */
  readonly indirect: boolean;

  /** Direct check: does `value` already have this type? */
  readonly is: (value: unknown) => value is T;

  /** Convert a value of the same underlying type across the Ref wrapper. */
  readonly coerce: (value: unknown) => Coerced<T>;

  /** Phantom type brand - associates the reference with its value type */
  readonly [TYPE_BRAND]: T;
}

/**
 * Extracts the value type described by a TypeRef.
 */
export type TypeOf<R> = R extends TypeRef<infer T> ? T : never;

/**
 * Generic constructor signature accepted by {@link typeOf}.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

function freezeTypeRef<T>(
  name: string,
  indirect: boolean,
  is: (value: unknown) => value is T,
  coerce: (value: unknown) => Coerced<T>
): TypeRef<T> {
  return Object.freeze({ kind: 'type', name, indirect, is, coerce }) as TypeRef<T>;
}

/**
 * Describe a type by name, with an optional runtime guard.
 *
 * Without a guard every non-Ref value is accepted as `T`; pass one when the
 * container should reject mis-typed factory results.
 *
 * @example
 * ```typescript
 * const Port = typeRef<number>('Port', (v): v is number => typeof v === 'number');
 * const Settings = typeRef<AppSettings>('app.Settings');
 * ```
 */
export function typeRef<T>(name: string, guard?: (value: unknown) => value is T): TypeRef<T> {
  if (!name) throw new TypeError('typeRef() requires a non-empty name');
  const accepts = guard ?? ((_value: unknown): _value is T => true);

  return freezeTypeRef<T>(
    name,
    false,
    (value: unknown): value is T => !(value instanceof Ref) && accepts(value),
    (value) => (value instanceof Ref && accepts(value.value) ? { value: value.value } : undefined)
  );
}

/**
 * Describe a class. The name comes from the constructor, the guard is `instanceof`.
 */
export function typeOf<T>(ctor: Constructor<T>, name: string = ctor.name): TypeRef<T> {
  return typeRef<T>(name, (value: unknown): value is T => value instanceof ctor);
}

/**
 * Describe `Ref<T>`: the same underlying type behind the indirection wrapper.
 *
 * A plain value coerced to `Ref<T>` is wrapped in a new `Ref` each time, so
 * two creations of a singleton through `ref()` return distinct wrappers
 * around the same value. Register the `ref()` type itself when callers
 * compare wrappers by identity.
 */
export function ref<T>(inner: TypeRef<T>): TypeRef<Ref<T>> {
  if (inner.indirect) throw new TypeError(`ref() cannot wrap '${inner.name}' twice`);

  return freezeTypeRef<Ref<T>>(
    inner.name,
    true,
    (value: unknown): value is Ref<T> => value instanceof Ref && inner.is(value.value),
    (value) => (!(value instanceof Ref) && inner.is(value) ? { value: new Ref(value) } : undefined)
  );
}

/**
 * Runtime type guard to check if a value is a TypeRef.
 */
export function isTypeRef(x: unknown): x is TypeRef<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    Reflect.get(x, 'kind') === 'type' &&
    typeof Reflect.get(x, 'name') === 'string' &&
    typeof Reflect.get(x, 'is') === 'function'
  );
}

/**
 * Marker for pairs whose instance needs no configuration.
 */
export class NoConfigMarker {}

/** Sentinel configuration type: `createPair` skips the configuration side. */
export const NoConfig: TypeRef<NoConfigMarker> = typeOf(NoConfigMarker, 'di.NoConfig');

export function isNoConfig(t: TypeRef<unknown>): boolean {
  return t.name === NoConfig.name;
}

// ---------- keys ----------

/** Separates the token from the type name in a type key. */
export const TYPE_KEY_SEPARATOR = ':';

/** Separates the two halves of a pair key. */
export const PAIR_KEY_SEPARATOR = ';';

/**
 * Registry key for a type: `typeName`, or `token:typeName` when a
 * non-empty token is supplied.
 */
export function deriveTypeKey(typeName: string, token?: string): string {
  if (token) return `${token}${TYPE_KEY_SEPARATOR}${typeName}`;
  return typeName;
}

/**
 * Registry key for two bound types. Order matters: the configuration side
 * registers under `pair(config, instance)`, the instance side under
 * `pair(instance, config)`.
 */
export function derivePairKey(first: string, second: string): string {
  return `${first}${PAIR_KEY_SEPARATOR}${second}`;
}

// ---------- coercion ----------

export type AssertResult<T> = { ok: true; value: T } | { ok: false };

/**
 * Narrow an opaque value to `type`.
 *
 * Tries the direct guard first, then the conversion between a value and a
 * {@link Ref} to the same underlying type. Nothing else is converted.
 */
export function safeTypeAssert<T>(value: unknown, target: TypeRef<T>): AssertResult<T> {
  if (target.is(value)) return { ok: true, value };

  const coerced = target.coerce(value);
  if (coerced) return { ok: true, value: coerced.value };

  return { ok: false };
}

/**
 * Describe a runtime value for diagnostics.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Ref) return `Ref<${describeValue(value.value)}>`;
  if (typeof value === 'object') return value.constructor?.name ?? 'Object';
  if (typeof value === 'function') return `function ${value.name || 'anonymous'}`;
  return typeof value;
}

/**
 * Describe a TypeRef for diagnostics, e.g. `Ref<Database>`.
 */
export function describeType(t: TypeRef<unknown>): string {
  return t.indirect ? `Ref<${t.name}>` : t.name;
}
