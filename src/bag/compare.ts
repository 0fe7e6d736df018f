import {InvariantViolation} from '../error/asserts.js';

/**
 * Three-way comparison: negative when `l` sorts before `r`, zero when they
 * are the same value, positive otherwise. A bag only ever asks whether the
 * result is zero.
 */
export type Comparator<T> = (l: T, r: T) => number;

/**
 * Values that know how to compare themselves against their peers.
 */
export interface Comparable<T> {
  compareTo(other: T): number;
}

export function isComparable(v: unknown): v is Comparable<unknown> {
  return (
    typeof v === 'object' &&
    v !== null &&
    'compareTo' in v &&
    typeof v.compareTo === 'function'
  );
}

/**
 * The comparator bags use when none is given.
 *
 * `null` and `undefined` sort first. Primitives of the same type compare by
 * value, `Date`s by time, and `Comparable` objects through `compareTo`.
 * Anything else cannot be ordered.
 */
export function compareValues(lVal: unknown, rVal: unknown): number {
  if (lVal === rVal) {
    return 0;
  }
  if (lVal === null || lVal === undefined) {
    return -1;
  }
  if (rVal === null || rVal === undefined) {
    return 1;
  }
  if (isComparable(lVal)) {
    return lVal.compareTo(rVal);
  }
  if (lVal instanceof Date && rVal instanceof Date) {
    return lVal.getTime() - rVal.getTime();
  }
  if (typeof lVal === 'number' && typeof rVal === 'number') {
    return compareNumbers(lVal, rVal);
  }
  if (typeof lVal === 'string' && typeof rVal === 'string') {
    return lVal < rVal ? -1 : 1;
  }
  if (typeof lVal === 'bigint' && typeof rVal === 'bigint') {
    return lVal < rVal ? -1 : 1;
  }
  if (typeof lVal === 'boolean' && typeof rVal === 'boolean') {
    return lVal ? 1 : -1;
  }

  throw new InvariantViolation(
    `Cannot compare ${describe(lVal)} with ${describe(
      rVal,
    )}, pass a comparator to the bag`,
  );
}

function compareNumbers(l: number, r: number): number {
  if (l < r) {
    return -1;
  }
  if (l > r) {
    return 1;
  }
  // One side is NaN. NaN equals NaN and sorts after every other number.
  if (Number.isNaN(l)) {
    return Number.isNaN(r) ? 0 : 1;
  }
  return -1;
}

function describe(v: unknown): string {
  return typeof v === 'object' ? v?.constructor?.name ?? 'object' : typeof v;
}
