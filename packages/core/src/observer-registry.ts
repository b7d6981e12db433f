/**
 * @watchpoint/core — Registry of tagged observers.
 *
 * Fans `update` and `remove` out across many observers, selectively by tag
 * or in bulk, and reports what happened on an rxjs event stream.
 *
 * @module @watchpoint/core
 */

import { Subject } from 'rxjs';
import { type WatchpointLogger, createLogger } from './observability/logger.js';
import { Observer } from './observer.js';
import type {
  Accessor,
  ObserverDefaults,
  ObserverRegistryConfig,
  ObserverTag,
  RegistryEvent,
  RegistryObserverOptions,
  RegistryStats,
  Updatable,
  UpdateTarget,
} from './types.js';

const defaultLogger = createLogger({ module: 'watchpoint' });

/** Symbols do not survive JSON log output */
function describeTag(tag: ObserverTag): string | number {
  return typeof tag === 'symbol' ? tag.toString() : tag;
}

// ── Observer Registry ─────────────────────────────────────

/**
 * Owns a tag → observer mapping.
 *
 * Entries are held through the {@link Updatable} capability only, so one
 * registry can hold observers of different value types. Tearing a registry
 * down is `remove()` with no tag, or {@link dispose} to also complete
 * `events$`.
 *
 * @example
 * ```typescript
 * const registry = createObserverRegistry({ defaults: { fireOnFirstSample: true } });
 *
 * registry.add(() => store.user.name, { tag: 'name', onChange: renderName });
 * registry.add(() => store.cart.length, { tag: 'cart', onChange: renderBadge });
 *
 * // once per redraw
 * registry.update();
 * // or only one of them
 * registry.update('cart');
 * ```
 */
export class ObserverRegistry implements UpdateTarget {
  private readonly observers = new Map<ObserverTag, Updatable>();
  private readonly events$$ = new Subject<RegistryEvent>();
  private readonly defaults: Partial<ObserverDefaults>;
  private readonly logger: WatchpointLogger;
  private totalUpdates = 0;
  private totalChanges = 0;

  /** Synchronous stream of registry activity; completes on {@link dispose} */
  readonly events$ = this.events$$.asObservable();

  constructor(config: ObserverRegistryConfig = {}) {
    this.defaults = { ...config.defaults };
    this.logger = (config.logger ?? defaultLogger).child('registry');
  }

  /** Number of registered observers */
  get size(): number {
    return this.observers.size;
  }

  /**
   * Construct an observer and store it under `options.tag`, or under the
   * observer's own `id` when no tag is given. An existing entry with the
   * same tag is replaced.
   *
   * @returns The constructed observer, which can also be updated directly
   */
  add<V>(accessor: Accessor<V>, options: RegistryObserverOptions<V>): Observer<V> {
    const { tag, ...observerOptions } = options;
    const observer = new Observer(accessor, {
      ...observerOptions,
      initializeImmediately: observerOptions.initializeImmediately ?? this.defaults.initializeImmediately,
      fireOnFirstSample: observerOptions.fireOnFirstSample ?? this.defaults.fireOnFirstSample,
      maxHistoryLength: observerOptions.maxHistoryLength ?? this.defaults.maxHistoryLength,
      clock: observerOptions.clock ?? this.defaults.clock,
      logger: observerOptions.logger ?? this.logger.child('observer'),
    });

    const key = tag ?? observer.id;
    const replaced = this.observers.has(key);
    this.observers.set(key, observer);

    this.logger.debug('Observer added', { tag: describeTag(key), replaced });
    this.events$$.next({ type: 'added', tag: key });
    return observer;
  }

  /**
   * Remove the observer under `tag`, or every observer when `tag` is
   * omitted. Unknown tags are ignored.
   */
  remove(tag?: ObserverTag): void {
    if (tag === undefined) {
      const count = this.observers.size;
      this.observers.clear();
      this.logger.debug('Observers cleared', { count });
      this.events$$.next({ type: 'cleared', count });
      return;
    }

    if (this.observers.delete(tag)) {
      this.logger.debug('Observer removed', { tag: describeTag(tag) });
      this.events$$.next({ type: 'removed', tag });
    }
  }

  /**
   * Update the observer under `tag`, or every observer when `tag` is
   * omitted. Unknown tags are ignored. Bulk updates run in insertion order,
   * but callers must not depend on it. An observer removed or replaced by an
   * earlier callback in the same pass is skipped.
   *
   * An error thrown by an observer propagates immediately; observers after
   * it are not updated in that pass. A change whose callback threw is still
   * counted and reported on `events$`, since the observer committed it.
   *
   * @returns How many change callbacks fired
   */
  update(tag?: ObserverTag): number {
    if (tag !== undefined) {
      const observer = this.observers.get(tag);
      return observer && this.updateOne(tag, observer) ? 1 : 0;
    }

    let fired = 0;
    for (const [key, observer] of [...this.observers]) {
      if (this.observers.get(key) !== observer) continue;
      if (this.updateOne(key, observer)) fired++;
    }
    return fired;
  }

  /** Alias of {@link update} */
  updateAll(tag?: ObserverTag): number {
    return this.update(tag);
  }

  has(tag: ObserverTag): boolean {
    return this.observers.has(tag);
  }

  get(tag: ObserverTag): Updatable | undefined {
    return this.observers.get(tag);
  }

  /** Registered tags, in insertion order */
  tags(): ObserverTag[] {
    return Array.from(this.observers.keys());
  }

  getStats(): RegistryStats {
    return {
      observerCount: this.observers.size,
      totalUpdates: this.totalUpdates,
      totalChanges: this.totalChanges,
    };
  }

  /** Remove every observer and complete `events$` */
  dispose(): void {
    this.remove();
    this.events$$.complete();
  }

  // ── Private ──────────────────────────────────────────────

  private updateOne(tag: ObserverTag, observer: Updatable): boolean {
    this.totalUpdates++;
    const before = observer.lastEvent;
    let fired: boolean;
    try {
      fired = observer.update();
    } catch (error) {
      // the callback runs after the commit
      if (observer.lastEvent !== before) this.reportChange(tag, observer);
      throw error;
    }
    if (fired) this.reportChange(tag, observer);
    return fired;
  }

  private reportChange(tag: ObserverTag, observer: Updatable): void {
    this.totalChanges++;
    const event = observer.lastEvent;
    if (event) {
      this.events$$.next({
        type: 'changed',
        tag,
        value: event.value,
        changeTime: event.changeTime,
      });
    }
  }
}

// ── Factory ───────────────────────────────────────────────

export function createObserverRegistry(config?: ObserverRegistryConfig): ObserverRegistry {
  return new ObserverRegistry(config);
}
