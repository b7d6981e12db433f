/**
 * @watchpoint/core — Single-value change observer.
 *
 * An Observer samples its accessor only when `update()` is called, compares
 * the sample with the last committed snapshot and, when the comparator
 * reports a change, commits the new snapshot and invokes the callback
 * inline. There are no timers and no asynchronous dispatch; the caller
 * decides the cadence.
 *
 * @module @watchpoint/core
 */

import { identityChanged } from './comparators.js';
import { type WatchpointLogger, createLogger } from './observability/logger.js';
import type {
  Accessor,
  ChangeCallback,
  ChangeEvent,
  Clock,
  Comparator,
  HistoryEntry,
  ObserverDefaults,
  ObserverOptions,
  Updatable,
} from './types.js';
import { assertObserverOptions } from './validation/observer-options.js';

// ── Defaults ──────────────────────────────────────────────

export const DEFAULT_OBSERVER_OPTIONS: Readonly<ObserverDefaults> = Object.freeze({
  initializeImmediately: true,
  fireOnFirstSample: false,
  maxHistoryLength: 0,
  clock: Date.now,
});

const EMPTY_HISTORY: readonly HistoryEntry<never>[] = Object.freeze([]);

const defaultLogger = createLogger({ module: 'watchpoint:observer' });

function createEvent<V>(
  value: V,
  changeTime: number,
  history: readonly HistoryEntry<V>[]
): ChangeEvent<V> {
  return Object.freeze({ value, changeTime, history });
}

// ── Observer ──────────────────────────────────────────────

/**
 * Tracks one value and reports each change exactly once.
 *
 * The snapshot is committed *before* the callback runs. A re-entrant
 * `update()` from inside the callback therefore sees the new snapshot, and
 * a callback that throws leaves the change committed: retrying `update()`
 * with the same value does not fire again.
 *
 * @typeParam V - The observed value type
 *
 * @example
 * ```typescript
 * let count = 0;
 * const observer = createObserver(() => count, {
 *   onChange: (event) => console.log(event.value, event.history),
 *   maxHistoryLength: 3,
 * });
 *
 * count = 1;
 * observer.update(); // logs 1, [{ value: 0, ... }]
 * observer.update(); // no-op
 * ```
 */
export class Observer<V> implements Updatable {
  /** Opaque handle; the default registry tag */
  readonly id: symbol = Symbol('watchpoint.observer');
  readonly maxHistoryLength: number;

  private readonly accessor: Accessor<V>;
  private readonly onChange: ChangeCallback<V>;
  private readonly comparator: Comparator<V>;
  private readonly fireOnFirstSample: boolean;
  private readonly clock: Clock;
  private readonly logger: WatchpointLogger;
  private snapshot: ChangeEvent<V> | undefined;

  constructor(accessor: Accessor<V>, options: ObserverOptions<V>) {
    assertObserverOptions(accessor, options);

    this.accessor = accessor;
    this.onChange = options.onChange;
    this.comparator = options.comparator ?? identityChanged;
    this.fireOnFirstSample = options.fireOnFirstSample ?? DEFAULT_OBSERVER_OPTIONS.fireOnFirstSample;
    this.maxHistoryLength = options.maxHistoryLength ?? DEFAULT_OBSERVER_OPTIONS.maxHistoryLength;
    this.clock = options.clock ?? DEFAULT_OBSERVER_OPTIONS.clock;
    this.logger = options.logger ?? defaultLogger;

    if (options.initializeImmediately ?? DEFAULT_OBSERVER_OPTIONS.initializeImmediately) {
      const event = createEvent(this.accessor(), this.clock(), EMPTY_HISTORY);
      this.snapshot = event;
      if (this.fireOnFirstSample) {
        this.onChange(event);
      }
    }
  }

  /** Whether a value has been sampled yet */
  get hasSnapshot(): boolean {
    return this.snapshot !== undefined;
  }

  /** The last committed snapshot, including its history */
  get lastEvent(): ChangeEvent<V> | undefined {
    return this.snapshot;
  }

  /** The last committed value */
  get value(): V | undefined {
    return this.snapshot?.value;
  }

  /**
   * Sample the accessor and fire the callback if the value changed.
   *
   * Errors from the accessor or comparator propagate before anything is
   * mutated. Errors from the callback propagate after the commit.
   *
   * @returns `true` when the callback was invoked
   */
  update(): boolean {
    const current = this.accessor();
    const previous = this.snapshot;

    if (previous !== undefined && !this.comparator(previous.value, current)) {
      return false;
    }

    const event = createEvent(current, this.clock(), this.nextHistory(previous));
    this.snapshot = event;

    if (previous === undefined && !this.fireOnFirstSample) {
      this.logger.debug('Seeded initial snapshot');
      return false;
    }

    this.logger.debug('Change detected', {
      changeTime: event.changeTime,
      historyLength: event.history.length,
    });
    this.onChange(event);
    return true;
  }

  // ── Private ──────────────────────────────────────────────

  /** Prepend the outgoing snapshot and drop entries beyond the cap */
  private nextHistory(previous: ChangeEvent<V> | undefined): readonly HistoryEntry<V>[] {
    if (previous === undefined || this.maxHistoryLength === 0) {
      return EMPTY_HISTORY;
    }
    const entry: HistoryEntry<V> = Object.freeze({
      value: previous.value,
      changeTime: previous.changeTime,
    });
    return Object.freeze([entry, ...previous.history.slice(0, this.maxHistoryLength - 1)]);
  }
}

/**
 * Create an observer for the value returned by `accessor`.
 */
export function createObserver<V>(accessor: Accessor<V>, options: ObserverOptions<V>): Observer<V> {
  return new Observer(accessor, options);
}
