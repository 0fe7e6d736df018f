import type {OptionalLogger} from '@rocicorp/logger';
import {genMap, iterableFrom} from '../util/iterables.js';
import {
  MAX_SIZE,
  checkCapacity,
  type Bag,
  type BagIterator,
  type BagOptions,
  type Entry,
} from './bag.js';
import {compareValues, type Comparator} from './compare.js';

/**
 * Everything about a bag that can be written in terms of the other bag
 * operations. Subclasses supply storage and iteration.
 */
export abstract class AbstractBag<T> implements Bag<T> {
  readonly capacity: number;
  readonly comparator: Comparator<T>;
  protected readonly _logger: OptionalLogger;

  constructor(options: BagOptions<T> = {}) {
    const {
      capacity = MAX_SIZE,
      comparator = compareValues,
      logger = console,
    } = options;
    checkCapacity(capacity);
    this.capacity = capacity;
    this.comparator = comparator;
    this._logger = logger;
  }

  abstract add(value: T): void;
  abstract addWithOccurrences(value: T, occurrences: number): void;
  abstract contains(value: T): boolean;
  abstract countOf(value: T): number;
  abstract remove(value: T): void;
  abstract size(): number;
  abstract iterator(): BagIterator<T>;
  abstract allOccurrencesIterator(): BagIterator<T>;
  abstract entries(): Iterable<Entry<T>>;

  /**
   * Creates an empty bag of the same kind, sharing this bag's comparator and
   * logger. Used by the merge operations.
   */
  protected abstract _newBag(capacity: number): Bag<T>;

  isEmpty(): boolean {
    return this.size() === 0;
  }

  createMergedAllUnique(other: Bag<T>, capacity = MAX_SIZE): Bag<T> {
    const merged = this._newBag(capacity);
    for (const value of this) {
      merged.add(value);
    }
    for (const value of other) {
      if (!merged.contains(value)) {
        merged.add(value);
      }
    }
    return merged;
  }

  createMergedAllOccurrences(other: Bag<T>, capacity = MAX_SIZE): Bag<T> {
    const merged = this._newBag(capacity);
    for (const [value, count] of this.entries()) {
      merged.addWithOccurrences(value, count);
    }
    for (const [value, count] of other.entries()) {
      merged.addWithOccurrences(value, count);
    }
    return merged;
  }

  iterate(): Iterable<T> {
    return iterableFrom(() => this.iterator());
  }

  allOccurrences(): Iterable<T> {
    return iterableFrom(() => this.allOccurrencesIterator());
  }

  [Symbol.iterator](): Iterator<T> {
    return this.iterator();
  }

  toString(): string {
    const parts = genMap(
      this.entries(),
      ([value, count]) => `${String(value)}: ${count}`,
    );
    return `{${[...parts].join(', ')}}`;
  }
}
