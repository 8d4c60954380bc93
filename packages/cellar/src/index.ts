export { Registry } from './registry/registry.js';
export type { RegistryOptions } from './registry/registry.js';

export { Container } from './core/container.js';
export { Control } from './core/control.js';
export { cacheKey } from './core/cache-key.js';

export { createAccessors } from './api/accessors.js';
export type { Accessors } from './api/accessors.js';

export type {
  Argument,
  ArgumentPredicate,
  CacheSeed,
  CacheSeedMap,
  Constructor,
  ContainerOptions,
  DependencyRef,
  Initializer,
  Logger,
  OverrideMap,
  ResourceMap,
  ResourceOptions,
  ResourceSpec,
} from './types/types.js';

// Errors
export {
  AggregateCleanupError,
  ArgumentTypeError,
  ArgumentValidationError,
  CircularDependencyError,
  DuplicateResourceError,
  InvalidCacheValueError,
  InvalidContainerConfigError,
  InvalidSpecError,
  LockedModeError,
  MissingDependencyError,
  ReservedNameError,
  TeardownInProgressError,
  UnknownResourceError,
  UnloadableDependencyError,
} from './errors/errors.js';
