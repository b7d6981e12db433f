/**
 * @watchpoint/core — On-demand change detection.
 *
 * Observers sample a value only when told to and report each change once,
 * with an optional bounded history of earlier values. A registry fans
 * updates out across many tagged observers; a scope ties a registry to a
 * component's lifetime.
 *
 * @example
 * ```ts
 * import { createObserverRegistry, shallowArrayChanged } from '@watchpoint/core';
 *
 * const registry = createObserverRegistry();
 * registry.add(() => todos.items, {
 *   tag: 'todos',
 *   comparator: shallowArrayChanged,
 *   maxHistoryLength: 5,
 *   onChange: ({ value, history }) => render(value, history),
 * });
 *
 * // call from the render loop
 * registry.update();
 * ```
 *
 * @module @watchpoint/core
 */

// Types
export type {
  Accessor,
  ChangeCallback,
  ChangeEvent,
  Clock,
  Comparator,
  HistoryEntry,
  ObserverDefaults,
  ObserverOptions,
  ObserverRegistryConfig,
  ObserverTag,
  RegistryEvent,
  RegistryObserverOptions,
  RegistryStats,
  Updatable,
  UpdateTarget,
} from './types.js';

// Observer
export { DEFAULT_OBSERVER_OPTIONS, Observer, createObserver } from './observer.js';

// Registry
export { ObserverRegistry, createObserverRegistry } from './observer-registry.js';

// Scope
export { ObserverScope, createObserverScope } from './observer-scope.js';

// Drivers
export { bindUpdates, updatesOn, type BindUpdatesOptions } from './update-trigger.js';

// Comparators
export {
  arrayChanged,
  identityChanged,
  jsonChanged,
  shallowArrayChanged,
  shallowObjectChanged,
} from './comparators.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Validation
export * from './validation/index.js';
