import type {OptionalLogger} from '@rocicorp/logger';
import {InvalidCapacityError} from '../error/bag-error.js';
import type {Comparator} from './compare.js';

/**
 * The largest capacity a bag can be created with. Capacity bounds the number
 * of distinct values, not the number of occurrences of each value.
 */
export const MAX_SIZE = 1000;

/**
 * @throws InvalidCapacityError unless `capacity` is an integer between 1 and
 * {@link MAX_SIZE}.
 */
export function checkCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1 || capacity > MAX_SIZE) {
    throw new InvalidCapacityError(capacity, MAX_SIZE);
  }
}

export type Multiplicity = number;

/**
 * A distinct value of a bag together with its occurrence count.
 */
export type Entry<T> = readonly [T, Multiplicity];

export type BagOptions<T> = {
  /** Maximum number of distinct values. Defaults to {@link MAX_SIZE}. */
  capacity?: number | undefined;
  /**
   * Decides which values are the same entry: two values are equal iff the
   * comparator returns 0. Defaults to `compareValues`, which only orders
   * primitives, `Date`s and `Comparable` objects. Bags of plain objects need
   * a comparator.
   */
  comparator?: Comparator<T> | undefined;
  logger?: OptionalLogger | undefined;
};

/**
 * An iterator that can also be asked whether another value is available
 * without consuming it.
 */
export interface BagIterator<T> extends Iterator<T> {
  hasNext(): boolean;
}

/**
 * A bag holds a collection of values along with a count of how many copies
 * of each value it contains.
 *
 * Each distinct value is stored once. Adding an equal value increments its
 * count and removing one decrements it; a value whose count reaches zero is
 * no longer stored.
 *
 * Iterating a bag directly yields each distinct value once, in insertion
 * order. Use {@link Bag.allOccurrences} to see every copy.
 *
 * Iterators, including those of {@link Bag.entries}, are invalidated by any
 * later `add` or `remove` on the bag and throw `ConcurrentModificationError`
 * when advanced.
 */
export interface Bag<T> extends Iterable<T> {
  readonly capacity: number;
  readonly comparator: Comparator<T>;

  /**
   * Adds one occurrence of `value`.
   * @throws CapacityExceededError if `value` is new and the bag already holds
   * `capacity` distinct values.
   */
  add(value: T): void;

  /**
   * Adds `occurrences` copies of `value` in one step. Does nothing when
   * `occurrences` is zero, negative or NaN.
   * @throws CapacityExceededError as {@link Bag.add}.
   * @throws InvariantViolation if `occurrences` is not a safe integer, or the
   * resulting count would not be one.
   */
  addWithOccurrences(value: T, occurrences: number): void;

  contains(value: T): boolean;

  /** Number of occurrences of `value`, 0 if absent. */
  countOf(value: T): number;

  /**
   * Removes one occurrence of `value`, dropping the value once its count
   * reaches zero. Does nothing if the value is not in the bag.
   */
  remove(value: T): void;

  /** Number of distinct values. Occurrences are not counted. */
  size(): number;

  isEmpty(): boolean;

  /**
   * Creates a new bag holding every distinct value of this bag and `other`,
   * each with a count of 1. Neither operand is modified.
   * @param capacity Capacity of the new bag, {@link MAX_SIZE} by default.
   * @throws CapacityExceededError if the union does not fit.
   */
  createMergedAllUnique(other: Bag<T>, capacity?: number): Bag<T>;

  /**
   * Creates a new bag holding every distinct value of this bag and `other`
   * with the two counts summed. Neither operand is modified.
   * @param capacity Capacity of the new bag, {@link MAX_SIZE} by default.
   * @throws CapacityExceededError if the union does not fit.
   */
  createMergedAllOccurrences(other: Bag<T>, capacity?: number): Bag<T>;

  /** Iterator over each distinct value. */
  iterator(): BagIterator<T>;

  /** Iterator over every occurrence, copies of a value kept together. */
  allOccurrencesIterator(): BagIterator<T>;

  /** Restartable view of {@link Bag.iterator}. */
  iterate(): Iterable<T>;

  /** Restartable view of {@link Bag.allOccurrencesIterator}. */
  allOccurrences(): Iterable<T>;

  /** Restartable view of `[value, count]` pairs. */
  entries(): Iterable<Entry<T>>;
}
