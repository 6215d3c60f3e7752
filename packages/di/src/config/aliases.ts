import type { Constructor } from '../core/type-ref.js';

/**
 * Serialization metadata for one property of a configuration class.
 */
export interface ConfigFieldMetadata {
  /** Key used in the configuration document instead of the property name. */
  alias?: string;

  /** Class the field decodes into (a nested configuration class, or `Date`). */
  type?: () => Constructor;
}

type FieldTable = Map<string, ConfigFieldMetadata>;

/**
 * Global symbol for storing the alias registry on globalThis, so duplicated
 * copies of this module see the same metadata.
 */
const GLOBAL_SYMBOL = Symbol.for('wirecfg.di.configAliasRegistry');

function loadStore(): WeakMap<object, FieldTable> {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (existing instanceof WeakMap) return existing;

  const store = new WeakMap<object, FieldTable>();
  Reflect.set(globalThis, GLOBAL_SYMBOL, store);
  return store;
}

const store = loadStore();

function tableFor(ctor: object): FieldTable {
  let table = store.get(ctor);
  if (!table) {
    table = new Map();
    store.set(ctor, table);
  }
  return table;
}

/**
 * Walk the prototype chain of `value` from most to least derived, yielding
 * each constructor that has field metadata.
 */
function* tablesOf(value: object): Generator<FieldTable> {
  let proto: unknown = Object.getPrototypeOf(value);
  while (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
    const ctor: unknown = Reflect.get(proto, 'constructor');
    if (typeof ctor === 'function') {
      const table = store.get(ctor);
      if (table) yield table;
    }
    proto = Object.getPrototypeOf(proto);
  }
}

/**
 * Field metadata recorded by {@link ConfigKey} and {@link ConfigType},
 * keyed by the class constructor. Subclasses see the metadata of their
 * base classes; a redeclaration in the subclass wins.
 */
export const ConfigAliasRegistry = {
  /** @internal */
  record(ctor: object, property: string, patch: ConfigFieldMetadata): void {
    const table = tableFor(ctor);
    table.set(property, { ...table.get(property), ...patch });
  },

  /** Every decorated property of `value` and its metadata. */
  fieldsOf(value: object): Map<string, ConfigFieldMetadata> {
    const merged = new Map<string, ConfigFieldMetadata>();
    const tables = [...tablesOf(value)].reverse();
    for (const table of tables) {
      for (const [property, meta] of table) {
        merged.set(property, { ...merged.get(property), ...meta });
      }
    }
    return merged;
  },

  /** Property of `value` whose declared alias is `alias`, if any. */
  propertyForAlias(value: object, alias: string): string | undefined {
    for (const table of tablesOf(value)) {
      for (const [property, meta] of table) {
        if (meta.alias === alias) return property;
      }
    }
    return undefined;
  },

  /** Declared alias of `property` on `value`, if any. */
  aliasOf(value: object, property: string): string | undefined {
    for (const table of tablesOf(value)) {
      const alias = table.get(property)?.alias;
      if (alias !== undefined) return alias;
    }
    return undefined;
  },
};

function recordOn(target: object, propertyKey: string | symbol, patch: ConfigFieldMetadata): void {
  if (typeof propertyKey !== 'string') {
    throw new TypeError('configuration fields must have string names');
  }

  // Target is the class prototype for instance property decorators.
  const ctor: unknown = Reflect.get(target, 'constructor');
  if (typeof ctor !== 'function') {
    throw new TypeError(`cannot record metadata for '${propertyKey}': no constructor`);
  }

  ConfigAliasRegistry.record(ctor, propertyKey, patch);
}

/**
 * Declare the key a property is stored under in configuration documents.
 *
 * Path lookups try the property name first and fall back to the alias;
 * the encoder writes the alias.
 *
 * @example
 * ```typescript
 * class DatabaseConfig {
 *   @ConfigKey('max_connections') maxConnections = 10;
 * }
 * ```
 */
export function ConfigKey(alias: string): PropertyDecorator {
  if (!alias) throw new TypeError('@ConfigKey expects a non-empty alias');

  return function (target: object, propertyKey: string | symbol) {
    recordOn(target, propertyKey, { alias });
  };
}

/**
 * Declare the class a property decodes into: a nested configuration class,
 * or `Date` for time values.
 *
 * @example
 * ```typescript
 * class ServiceConfig {
 *   @ConfigType(() => DatabaseConfig) database = new DatabaseConfig();
 *   @ConfigType(() => Date) startsAt?: Date;
 * }
 * ```
 */
export function ConfigType(type: () => Constructor): PropertyDecorator {
  return function (target: object, propertyKey: string | symbol) {
    recordOn(target, propertyKey, { type });
  };
}
