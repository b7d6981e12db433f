/**
 * @watchpoint/core — Drive updates from an rxjs stream.
 *
 * Observers never schedule themselves. These helpers let any stream act as
 * the external driver: a redraw signal, `animationFrames()`, a store's
 * change notifications, or `interval()` when polling is really wanted.
 *
 * @module @watchpoint/core
 */

import { type Observable, type Subscription, map } from 'rxjs';
import type { ObserverTag, UpdateTarget } from './types.js';

export interface BindUpdatesOptions {
  /** Restrict updates to one tag of a registry or scope */
  tag?: ObserverTag;
  /**
   * Receives an error thrown by an accessor, comparator or callback. The
   * binding is torn down either way; without a handler rxjs reports the
   * error as unhandled.
   */
  onError?: (error: unknown) => void;
}

/**
 * Cold stream that calls `target.update(tag)` once per emission of
 * `trigger$` and emits whatever the update returned.
 */
export function updatesOn<R>(
  target: { update(tag?: ObserverTag): R },
  trigger$: Observable<unknown>,
  tag?: ObserverTag
): Observable<R> {
  return trigger$.pipe(map(() => target.update(tag)));
}

/**
 * Update `target` on every emission of `trigger$` until the returned
 * subscription is unsubscribed or `trigger$` completes.
 *
 * @example
 * ```typescript
 * const redraw$ = new Subject<void>();
 * const binding = bindUpdates(registry, redraw$);
 *
 * redraw$.next(); // registry.update()
 * binding.unsubscribe();
 * ```
 */
export function bindUpdates(
  target: UpdateTarget,
  trigger$: Observable<unknown>,
  options: BindUpdatesOptions = {}
): Subscription {
  const updates$ = updatesOn(target, trigger$, options.tag);
  return options.onError ? updates$.subscribe({ error: options.onError }) : updates$.subscribe();
}
