export type BagErrorKind =
  | 'InvalidCapacity'
  | 'CapacityExceeded'
  | 'UnknownImplementation'
  | 'ConcurrentModification';

/**
 * Base class of every error a bag, its iterators or the factory throw.
 * Switch on `kind` rather than `instanceof` when the concrete class does not
 * matter.
 */
export abstract class BagError extends Error {
  abstract readonly kind: BagErrorKind;
}

export class InvalidCapacityError extends BagError {
  readonly kind = 'InvalidCapacity';
  readonly capacity: number;

  constructor(capacity: number, max: number) {
    super(
      capacity < 1
        ? `Attempting to create a bag with capacity ${capacity}, less than 1`
        : capacity > max
        ? `Attempting to create a bag with capacity ${capacity}, greater than maximum ${max}`
        : `Attempting to create a bag with non-integer capacity ${capacity}`,
    );
    this.capacity = capacity;
  }
}

export class CapacityExceededError extends BagError {
  readonly kind = 'CapacityExceeded';
  readonly capacity: number;

  constructor(capacity: number) {
    super(`Bag is full: it already holds ${capacity} distinct values`);
    this.capacity = capacity;
  }
}

export class UnknownImplementationError extends BagError {
  readonly kind = 'UnknownImplementation';
  readonly implementation: string;

  constructor(implementation: string) {
    super(
      `No bag implementation is registered as ${JSON.stringify(implementation)}`,
    );
    this.implementation = implementation;
  }
}

export class ConcurrentModificationError extends BagError {
  readonly kind = 'ConcurrentModification';

  constructor() {
    super('Bag was modified after this iterator was created');
  }
}
