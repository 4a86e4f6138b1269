/**
 * @categoryDescription Common
 * Common functions and types.
 * @module
 */

/**
 * Base error class for all stowage errors
 */
export class StowageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StowageError';
  }
}

/**
 * Error thrown when reading from or removing out of a container that holds no elements
 */
export class EmptyContainerError extends StowageError {
  constructor(message: string = 'Container is empty', options?: ErrorOptions) {
    super(message, options);
    this.name = 'EmptyContainerError';
  }
}

/**
 * Error thrown when appending to a full container with growth disabled
 */
export class ContainerFullError extends StowageError {
  constructor(message: string = 'Container is full', options?: ErrorOptions) {
    super(message, options);
    this.name = 'ContainerFullError';
  }
}

/**
 * Comparison function type for container ordering
 * Returns negative if a < b, positive if a > b, zero if a === b
 *
 * @category Common
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Element types with a built-in ordering. Containers of any other type need a {@link Comparator}.
 *
 * @category Common
 */
export type Ordered = number | string | bigint;

/**
 * The natural ordering of numbers, strings and bigints.
 *
 * @category Common
 */
export function naturalOrder<T extends Ordered>(a: T, b: T): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

/**
 * Flips a comparator. Turns a min-heap into a max-heap.
 *
 * @example
 * ```typescript
 * const heap = newHeap<number>({ comparator: reverseOrder(naturalOrder) });
 * ```
 *
 * @category Common
 */
export function reverseOrder<T>(comparator: Comparator<T>): Comparator<T> {
  return (a, b) => comparator(b, a);
}

/**
 * Read-only view shared by every container.
 *
 * @category Common
 */
export interface Container {
  /** the number of elements held */
  readonly count: number;
  /** whether the container holds no elements */
  readonly isEmpty: boolean;
}

/**
 * A {@link Container} backed by fixed-length storage that can be reallocated.
 *
 * @category Common
 */
export interface BoundedContainer extends Container {
  /** the number of slots in the backing storage */
  readonly capacity: number;
  /** whether every slot is occupied */
  readonly isFull: boolean;
  /** replace the backing storage, preserving the elements */
  reallocate(newCapacity: number): void;
}

function isOrdered(value: unknown): value is Ordered {
  const type = typeof value;
  return type === 'number' || type === 'string' || type === 'bigint';
}

/**
 * The default comparator of the factories. Their overloads only let it reach {@link Ordered}
 * elements; anything else throws rather than comparing as equal.
 */
export function _defaultOrder<T>(): Comparator<T> {
  return (a, b) => {
    if (!isOrdered(a) || !isOrdered(b)) {
      throw new StowageError(
        'Elements without a natural order need a comparator'
      );
    }
    return naturalOrder<Ordered>(a, b);
  };
}

export const DEFAULT_CAPACITY = 16;

/** the longest array length the runtime allows */
export const MAX_CAPACITY = 2 ** 32 - 1;

export function _checkCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new StowageError(
      `Capacity must be a non-negative integer, got ${capacity}`
    );
  }
  if (capacity > MAX_CAPACITY) {
    throw new StowageError(
      `Capacity must be at most ${MAX_CAPACITY}, got ${capacity}`
    );
  }
}

/** capacity to grow into when a full container doubles */
export function _grownCapacity(capacity: number): number {
  if (capacity >= MAX_CAPACITY) {
    throw new StowageError(`Cannot grow beyond capacity ${MAX_CAPACITY}`);
  }
  return Math.min(MAX_CAPACITY, Math.max(1, capacity * 2));
}
