import type {OptionalLogger} from '@rocicorp/logger';
import {z} from 'zod';
import {UnknownImplementationError} from '../error/bag-error.js';
import {ArrayBag} from './array-bag.js';
import {checkCapacity, MAX_SIZE, type Bag, type BagOptions} from './bag.js';
import type {Comparator} from './compare.js';

export type BagConstructor = <T>(options: BagOptions<T>) => Bag<T>;

export type BagKind = 'array';

export type BagConstructors = Record<BagKind, BagConstructor>;

/**
 * Every bag implementation, keyed by kind.
 */
export const bagConstructors: BagConstructors = {
  array: <T>(options: BagOptions<T>): Bag<T> => new ArrayBag<T>(options),
};

const bagKindsByName = new Map<string, BagKind>([
  ['array', 'array'],
  ['ArrayBag', 'array'],
]);

export function createBag<T>(
  kind: BagKind,
  options: BagOptions<T> = {},
): Bag<T> {
  return bagConstructors[kind](options);
}

/**
 * Resolves a bag kind named at runtime, for example in a config file. Both the
 * kind (`array`) and the class name (`ArrayBag`) are accepted.
 */
export function parseBagKind(name: string): BagKind {
  const kind = bagKindsByName.get(name);
  if (kind === undefined) {
    throw new UnknownImplementationError(name);
  }
  return kind;
}

export type BagConfig = {
  kind: BagKind;
  /** Capacity of bags created without an explicit one. */
  capacity?: number | undefined;
};

const bagConfigSchema = z.object({
  kind: z.string(),
  capacity: z.number().optional(),
});

/**
 * Parses an untrusted config value. Throws a `ZodError` if it has the wrong
 * shape and `UnknownImplementationError` if it names an unknown kind.
 */
export function parseBagConfig(json: unknown): BagConfig {
  const {kind, capacity} = bagConfigSchema.parse(json);
  return {kind: parseBagKind(kind), capacity};
}

/**
 * Creates bags of one configured kind.
 */
export class BagFactory {
  readonly config: BagConfig;
  readonly #constructors: BagConstructors;
  readonly #logger: OptionalLogger;

  constructor(
    config: BagConfig,
    logger: OptionalLogger = console,
    constructors: BagConstructors = bagConstructors,
  ) {
    if (config.capacity !== undefined) {
      checkCapacity(config.capacity);
    }
    this.config = config;
    this.#logger = logger;
    this.#constructors = constructors;
  }

  getBag<T>(
    capacity: number = this.config.capacity ?? MAX_SIZE,
    comparator?: Comparator<T>,
  ): Bag<T> {
    const {kind} = this.config;
    this.#logger.debug?.(`creating ${kind} bag with capacity ${capacity}`);
    return this.#constructors[kind]<T>({
      capacity,
      comparator,
      logger: this.#logger,
    });
  }
}
