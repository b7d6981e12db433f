/**
 * @watchpoint/core — Scoped ownership of an observer registry.
 *
 * For components with a lifecycle: observe while alive, update on every
 * redraw, and tear every observer down exactly once on disposal.
 *
 * @module @watchpoint/core
 */

import type { Observable } from 'rxjs';
import { ScopeDisposedError } from './errors/watchpoint-error.js';
import { type WatchpointLogger, createLogger } from './observability/logger.js';
import type { Observer } from './observer.js';
import { ObserverRegistry } from './observer-registry.js';
import type {
  Accessor,
  ObserverRegistryConfig,
  ObserverTag,
  RegistryEvent,
  RegistryObserverOptions,
  UpdateTarget,
} from './types.js';

const defaultLogger = createLogger({ module: 'watchpoint' });

/**
 * Owns one {@link ObserverRegistry} for its lifetime.
 *
 * @example
 * ```typescript
 * class CartBadge {
 *   private readonly scope = createObserverScope();
 *
 *   constructor(private readonly cart: Cart) {
 *     this.scope.observe(() => cart.items.length, { onChange: () => this.flash() });
 *   }
 *
 *   render(): string {
 *     this.scope.updateObservers();
 *     return String(this.cart.items.length);
 *   }
 *
 *   destroy(): void {
 *     this.scope.dispose();
 *   }
 * }
 * ```
 */
export class ObserverScope implements UpdateTarget {
  private readonly registry: ObserverRegistry;
  private readonly logger: WatchpointLogger;
  private disposed = false;

  constructor(config: ObserverRegistryConfig = {}) {
    this.logger = (config.logger ?? defaultLogger).child('scope');
    this.registry = new ObserverRegistry({ ...config, logger: this.logger });
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Registry activity; completes when the scope is disposed */
  get events$(): Observable<RegistryEvent> {
    return this.registry.events$;
  }

  /** Add an observer to the scope's registry */
  observe<V>(accessor: Accessor<V>, options: RegistryObserverOptions<V>): Observer<V> {
    this.assertActive('observe');
    return this.registry.add(accessor, options);
  }

  /** Stop observing one tag; ignored after disposal */
  unobserve(tag: ObserverTag): void {
    if (this.disposed) return;
    this.registry.remove(tag);
  }

  /** Update one observer by tag, or all of them */
  updateObservers(tag?: ObserverTag): number {
    this.assertActive('update observers');
    return this.registry.update(tag);
  }

  /** Same as {@link updateObservers}, so a scope can be driven by `bindUpdates` */
  update(tag?: ObserverTag): number {
    return this.updateObservers(tag);
  }

  /**
   * Remove every observer and complete `events$`. Only the first call has
   * any effect.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const count = this.registry.size;
    this.registry.dispose();
    this.logger.debug('Scope disposed', { count });
  }

  private assertActive(operation: string): void {
    if (this.disposed) {
      throw new ScopeDisposedError(operation);
    }
  }
}

export function createObserverScope(config?: ObserverRegistryConfig): ObserverScope {
  return new ObserverScope(config);
}
