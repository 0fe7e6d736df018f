/**
 * Lazily maps `s`. The result can be iterated any number of times; each
 * traversal re-reads `s` from the start.
 */
export function genMap<T, U>(s: Iterable<T>, cb: (x: T) => U): Iterable<U> {
  return {
    *[Symbol.iterator]() {
      for (const x of s) {
        yield cb(x);
      }
    },
  };
}

/**
 * Wraps an iterator factory as an `Iterable`.
 *
 * `create` is a lambda so that every traversal gets a fresh iterator,
 * which makes the returned iterable restartable.
 */
export function iterableFrom<T>(create: () => Iterator<T>): Iterable<T> {
  return {
    [Symbol.iterator]() {
      return create();
    },
  };
}
