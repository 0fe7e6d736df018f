export {AbstractBag} from './bag/abstract-bag.js';
export {ArrayBag} from './bag/array-bag.js';
export {
  BagFactory,
  bagConstructors,
  createBag,
  parseBagConfig,
  parseBagKind,
  type BagConfig,
  type BagConstructor,
  type BagConstructors,
  type BagKind,
} from './bag/bag-factory.js';
export {
  MAX_SIZE,
  checkCapacity,
  type Bag,
  type BagIterator,
  type BagOptions,
  type Entry,
  type Multiplicity,
} from './bag/bag.js';
export {
  compareValues,
  isComparable,
  type Comparable,
  type Comparator,
} from './bag/compare.js';
export {InvariantViolation} from './error/asserts.js';
export {
  BagError,
  CapacityExceededError,
  ConcurrentModificationError,
  InvalidCapacityError,
  UnknownImplementationError,
  type BagErrorKind,
} from './error/bag-error.js';
