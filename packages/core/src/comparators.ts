/**
 * @watchpoint/core — Content-aware comparators.
 *
 * The default comparator only detects a new identity: an array mutated in
 * place looks unchanged, and an accessor that builds a fresh array on every
 * call looks changed every time. Observers of collections should pass one
 * of these, or their own.
 *
 * Every comparator returns `true` when the value counts as changed.
 *
 * @module @watchpoint/core
 */

import type { Comparator } from './types.js';

/** `current !== previous` */
export function identityChanged<V>(previous: V, current: V): boolean {
  return current !== previous;
}

/**
 * Element-wise comparison of two arrays. Elements are compared with
 * `elementChanged`, identity by default.
 */
export function arrayChanged<T>(
  elementChanged: Comparator<T> = identityChanged
): Comparator<readonly T[]> {
  return (previous, current) => {
    if (previous.length !== current.length) return true;
    const before = previous.values();
    for (const after of current) {
      const next = before.next();
      if (next.done || elementChanged(next.value, after)) return true;
    }
    return false;
  };
}

/** Arrays differ in length or in the identity of any element */
export const shallowArrayChanged: Comparator<readonly unknown[]> = arrayChanged();

/** Objects differ in their own enumerable keys or in the identity of any value */
export function shallowObjectChanged<T extends object>(previous: T, current: T): boolean {
  if (previous === current) return false;
  const previousKeys = Object.keys(previous);
  const currentKeys = Object.keys(current);
  if (previousKeys.length !== currentKeys.length) return true;
  for (const key of currentKeys) {
    if (!Object.prototype.hasOwnProperty.call(previous, key)) return true;
    if (Reflect.get(previous, key) !== Reflect.get(current, key)) return true;
  }
  return false;
}

/**
 * Compares JSON serializations. Key order matters, and values JSON cannot
 * represent (functions, `undefined` members) are ignored.
 */
export function jsonChanged<V>(previous: V, current: V): boolean {
  return JSON.stringify(previous) !== JSON.stringify(current);
}
