import {
  CapacityExceededError,
  ConcurrentModificationError,
} from '../error/bag-error.js';
import {InvariantViolation, must} from '../error/asserts.js';
import {AbstractBag} from './abstract-bag.js';
import type {Bag, BagIterator, BagOptions, Entry} from './bag.js';

/**
 * A stored value and its occurrence count. Never handed out: callers see
 * values or fresh `Entry` tuples.
 */
type Element<T> = {
  readonly value: T;
  count: number;
};

/**
 * What the iterators are allowed to see of an `ArrayBag`.
 */
type ArrayBagInternal<T> = {
  readonly elements: readonly Readonly<Element<T>>[];
  getVersion(): number;
};

/**
 * A bag backed by an array of elements kept in insertion order. Lookups scan
 * the array with the bag's comparator, which is fine for capacities up to
 * `MAX_SIZE`.
 */
export class ArrayBag<T> extends AbstractBag<T> {
  readonly #elements: Element<T>[] = [];
  #version = 0;
  readonly #internal: ArrayBagInternal<T>;

  constructor(options: BagOptions<T> = {}) {
    super(options);
    this.#internal = {
      elements: this.#elements,
      getVersion: () => this.#version,
    };
  }

  add(value: T): void {
    this.addWithOccurrences(value, 1);
  }

  addWithOccurrences(value: T, occurrences: number): void {
    if (!(occurrences > 0)) {
      return;
    }
    if (!Number.isSafeInteger(occurrences)) {
      throw new InvariantViolation(
        `Occurrences must be a safe integer, got ${occurrences}`,
      );
    }
    const element = this.#find(value);
    if (element !== undefined) {
      const count = element.count + occurrences;
      if (!Number.isSafeInteger(count)) {
        throw new InvariantViolation(
          `Count of ${String(value)} would exceed ${Number.MAX_SAFE_INTEGER}`,
        );
      }
      element.count = count;
      this.#version++;
      return;
    }
    if (this.#elements.length >= this.capacity) {
      this._logger.debug?.(
        `bag is full (${this.capacity} distinct values), cannot add ${String(
          value,
        )}`,
      );
      throw new CapacityExceededError(this.capacity);
    }
    this.#elements.push({value, count: occurrences});
    this.#version++;
  }

  contains(value: T): boolean {
    return this.#find(value) !== undefined;
  }

  countOf(value: T): number {
    return this.#find(value)?.count ?? 0;
  }

  remove(value: T): void {
    const index = this.#indexOf(value);
    if (index === -1) {
      this._logger.debug?.(`no such value ${String(value)}, skipping remove`);
      return;
    }
    const element = must(this.#elements[index]);
    element.count--;
    if (element.count === 0) {
      this.#elements.splice(index, 1);
    }
    this.#version++;
  }

  size(): number {
    return this.#elements.length;
  }

  iterator(): BagIterator<T> {
    return new UniqueValueIterator(this.#internal);
  }

  allOccurrencesIterator(): BagIterator<T> {
    return new AllOccurrencesIterator(this.#internal);
  }

  entries(): Iterable<Entry<T>> {
    const internal = this.#internal;
    return {
      *[Symbol.iterator]() {
        const version = internal.getVersion();
        for (let index = 0; ; index++) {
          checkNotModified(internal, version);
          const element = internal.elements[index];
          if (element === undefined) {
            return;
          }
          yield [element.value, element.count] as const;
        }
      },
    };
  }

  protected _newBag(capacity: number): Bag<T> {
    return new ArrayBag<T>({
      capacity,
      comparator: this.comparator,
      logger: this._logger,
    });
  }

  #indexOf(value: T): number {
    return this.#elements.findIndex(
      element => this.comparator(element.value, value) === 0,
    );
  }

  #find(value: T): Element<T> | undefined {
    return this.#elements.find(
      element => this.comparator(element.value, value) === 0,
    );
  }
}

function checkNotModified<T>(internal: ArrayBagInternal<T>, version: number) {
  if (internal.getVersion() !== version) {
    throw new ConcurrentModificationError();
  }
}

/**
 * Yields each distinct value once.
 *
 * State: the index of the next element.
 */
class UniqueValueIterator<T> implements BagIterator<T> {
  readonly #internal: ArrayBagInternal<T>;
  readonly #version: number;
  #index = 0;

  constructor(internal: ArrayBagInternal<T>) {
    this.#internal = internal;
    this.#version = internal.getVersion();
  }

  hasNext(): boolean {
    return this.#index < this.#internal.elements.length;
  }

  next(): IteratorResult<T> {
    checkNotModified(this.#internal, this.#version);
    if (!this.hasNext()) {
      return {done: true, value: undefined};
    }
    const {value} = must(this.#internal.elements[this.#index++]);
    return {done: false, value};
  }
}

/**
 * Yields each value `count` times before moving to the next element.
 *
 * State: `(index, emitted)`, the current element and how many of its
 * occurrences have been yielded. Starts at `(0, 0)`. Once the current element
 * is used up the iterator moves to `(index + 1, 1)`, yielding the first
 * occurrence of the next element in the same step. Element counts are never
 * zero, so a next element always has at least that one occurrence.
 */
class AllOccurrencesIterator<T> implements BagIterator<T> {
  readonly #internal: ArrayBagInternal<T>;
  readonly #version: number;
  #index = 0;
  #emitted = 0;

  constructor(internal: ArrayBagInternal<T>) {
    this.#internal = internal;
    this.#version = internal.getVersion();
  }

  hasNext(): boolean {
    const {elements} = this.#internal;
    const current = elements[this.#index];
    if (current === undefined) {
      return false;
    }
    if (this.#emitted < current.count) {
      return true;
    }
    return this.#index + 1 < elements.length;
  }

  next(): IteratorResult<T> {
    checkNotModified(this.#internal, this.#version);
    if (!this.hasNext()) {
      return {done: true, value: undefined};
    }
    const {elements} = this.#internal;
    const current = must(elements[this.#index]);
    if (this.#emitted < current.count) {
      this.#emitted++;
      return {done: false, value: current.value};
    }
    this.#index++;
    this.#emitted = 1;
    return {done: false, value: must(elements[this.#index]).value};
  }
}
