/**
 * @watchpoint/core — Types for on-demand change detection.
 *
 * @module @watchpoint/core
 */

import type { WatchpointLogger } from './observability/logger.js';

// ── Values & Events ───────────────────────────────────────

/** Zero-argument function supplying the value to observe */
export type Accessor<V> = () => V;

/** Returns `true` when `current` counts as a change relative to `previous` */
export type Comparator<V> = (previous: V, current: V) => boolean;

/** Receives every detected change, synchronously from `update()` */
export type ChangeCallback<V> = (event: ChangeEvent<V>) => void;

/** Time source returning epoch milliseconds */
export type Clock = () => number;

/** A frozen prior snapshot */
export interface HistoryEntry<V> {
  readonly value: V;
  readonly changeTime: number;
}

/**
 * Passed to the change callback.
 *
 * `changeTime` is the time of the `update()` call that detected the change,
 * not the moment the underlying value was modified. `history` is
 * most-recent-first and frozen.
 */
export interface ChangeEvent<V> {
  readonly value: V;
  readonly changeTime: number;
  readonly history: readonly HistoryEntry<V>[];
}

// ── Configuration ─────────────────────────────────────────

/** Settings that a registry or scope may default for every observer it creates */
export interface ObserverDefaults {
  /** Sample the accessor once in the constructor (default: true) */
  initializeImmediately: boolean;
  /** Invoke the callback for the very first snapshot (default: false) */
  fireOnFirstSample: boolean;
  /** Number of prior snapshots carried on each event (default: 0) */
  maxHistoryLength: number;
  /** Time source (default: Date.now) */
  clock: Clock;
}

export interface ObserverOptions<V> extends Partial<ObserverDefaults> {
  /** Change callback */
  onChange: ChangeCallback<V>;
  /** Change predicate (default: `current !== previous`) */
  comparator?: Comparator<V>;
  /** Logger for change diagnostics (default: silent) */
  logger?: WatchpointLogger;
}

/** Opaque key identifying an observer within a registry */
export type ObserverTag = string | number | symbol;

export interface RegistryObserverOptions<V> extends ObserverOptions<V> {
  /** Registry key (default: the observer's own `id`) */
  tag?: ObserverTag;
}

export interface ObserverRegistryConfig {
  /** Defaults applied to every observer added to the registry */
  defaults?: Partial<ObserverDefaults>;
  /** Parent logger; the registry logs under a `registry` child */
  logger?: WatchpointLogger;
}

// ── Capabilities ──────────────────────────────────────────

/**
 * What a registry needs from its entries. Observers of any value type
 * satisfy it, so one registry can hold observers of different `V`.
 */
export interface Updatable {
  readonly id: symbol;
  /** The last committed snapshot */
  readonly lastEvent: ChangeEvent<unknown> | undefined;
  /** Sample and notify; returns whether the change callback fired */
  update(): boolean;
}

/** Anything `bindUpdates` can drive: an observer, a registry or a scope */
export interface UpdateTarget {
  update(tag?: ObserverTag): unknown;
}

// ── Registry Events & Stats ───────────────────────────────

export type RegistryEvent =
  | { type: 'added'; tag: ObserverTag }
  | { type: 'removed'; tag: ObserverTag }
  | { type: 'cleared'; count: number }
  | { type: 'changed'; tag: ObserverTag; value: unknown; changeTime: number };

export interface RegistryStats {
  observerCount: number;
  /** Observer updates performed through the registry */
  totalUpdates: number;
  /** Updates that detected a change */
  totalChanges: number;
}
