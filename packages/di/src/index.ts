// Registration and creation
export { register, registerConfiguration, registerPair } from './api/register.js';
export type { Factory, PairFactory } from './api/register.js';
export { create, createConfiguration, createPair, mustTypeAssert } from './api/create.js';

// Options
export {
  buildRegistryOpts,
  withBreadcrumbPath,
  withConfigNode,
  withConfiguration,
  withOpts,
  withRegistry,
  withToken,
} from './core/options.js';
export type { RegistryOpts, RegistryOption } from './core/options.js';

// Registry
export { DIRegistry, globalRegistry, hotInstanceKey, setGlobalRegistry } from './core/registry.js';
export type {
  ConfigurationFactory,
  InstanceFactory,
  Registration,
  Registry,
  RegistryOptions,
} from './core/registry.js';

// Context
export { Context, isConfiguration, newContext } from './core/context.js';
export type { ConfigRawData, Configuration, ContextArg } from './core/context.js';
export { DeadlineExceededError, ExecutionContext } from './core/execution.js';

// Tokens and types
export * from './core/token.js';
export {
  NoConfig,
  NoConfigMarker,
  PAIR_KEY_SEPARATOR,
  Ref,
  TYPE_KEY_SEPARATOR,
  derivePairKey,
  deriveTypeKey,
  describeType,
  describeValue,
  isNoConfig,
  isTypeRef,
  ref,
  safeTypeAssert,
  typeOf,
  typeRef,
} from './core/type-ref.js';
export type { AssertResult, Coerced, Constructor, TypeOf, TypeRef } from './core/type-ref.js';

// Configuration
export { ConfigAliasRegistry, ConfigKey, ConfigType } from './config/aliases.js';
export type { ConfigFieldMetadata } from './config/aliases.js';
export { assemblePath, configurationLookup, lookupNode } from './config/lookup.js';
export { TIME_KEY, decodeConfiguration, encodeConfiguration } from './config/decode.js';
export {
  SHARED_SECTION,
  extractNodeFromPath,
  findReferences,
  parseConfigurationDocument,
  resolveReferences,
  unmarshalWithReferences,
  validateReferences,
} from './config/references.js';

// Logging
export { ConsoleLogger, NullLogger } from './logging/logger.js';
export type { LogLevel, Logger } from './logging/logger.js';

// Errors
export * from './errors/index.js';
