import {
  _checkCapacity,
  _grownCapacity,
  type BoundedContainer,
  ContainerFullError,
  DEFAULT_CAPACITY,
  EmptyContainerError,
  StowageError,
} from './common';

/**
 * A double-ended queue over a circular buffer.
 *
 * Supported operations:
 * - `peek`, `dequeue` and `enqueue` at both ends in O(1)
 * - doubling growth on a full `enqueue`, unless the caller disables it
 * - explicit `reallocate`, which compacts the elements to the start of the new buffer
 * - left-to-right iteration over the live buffer
 *
 * @example
 * ```typescript
 * import { newDeque } from 'stowage';
 *
 * const deque = newDeque<number>({ capacity: 2 });
 * deque.enqueueRight(1);
 * deque.enqueueRight(2);
 * deque.enqueueLeft(0); // grows to capacity 4
 * [...deque]; // [0, 1, 2]
 *
 * deque.enqueueRight(3);
 * deque.enqueueRight(4, false); // throws ContainerFullError
 * ```
 *
 * @category Data Structure
 * @summary Double-ended queue over a circular buffer.
 */
export interface Deque<T> extends BoundedContainer, Iterable<T> {
  /** the leftmost element, or throw if empty */
  peekLeft(): T;
  /** the rightmost element, or throw if empty */
  peekRight(): T;
  /** remove and return the leftmost element, or throw if empty */
  dequeueLeft(): T;
  /** remove and return the rightmost element, or throw if empty */
  dequeueRight(): T;
  /** add an element on the left, growing if full and `allowGrow` is set, otherwise throw */
  enqueueLeft(item: T, allowGrow?: boolean): void;
  /** add an element on the right, growing if full and `allowGrow` is set, otherwise throw */
  enqueueRight(item: T, allowGrow?: boolean): void;
  /** Returns a copy of the elements, from left to right. */
  toArray(): T[];
  /** remove every element, keeping the capacity */
  clear(): void;
}

/**
 * @inline
 */
export interface DequeOptions {
  /** initial number of slots. Defaults to 16. */
  capacity?: number;
}

/**
 * Creates a new empty {@link Deque}.
 *
 * @category Data Structure
 */
export function newDeque<T>(options?: DequeOptions): Deque<T> {
  return new RingDeque<T>(options?.capacity ?? DEFAULT_CAPACITY);
}

export class RingDeque<T> implements Deque<T> {
  #items: (T | undefined)[];
  #left: number = 0;
  #right: number;
  #count: number = 0;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    _checkCapacity(capacity);
    this.#items = new Array(capacity);
    this.#right = this.#decrement(this.#left);
  }

  /**
   * Creates a full deque holding `items` in order, with a capacity equal to their number.
   */
  static from<T>(items: Iterable<T>): RingDeque<T> {
    const seed = Array.from(items);
    const deque = new RingDeque<T>(0);
    deque.#items = seed;
    deque.#count = seed.length;
    deque.#right = deque.#decrement(0);
    return deque;
  }

  get capacity(): number {
    return this.#items.length;
  }

  get count(): number {
    return this.#count;
  }

  get isEmpty(): boolean {
    return this.#count === 0;
  }

  get isFull(): boolean {
    return this.#count >= this.#items.length;
  }

  peekLeft(): T {
    if (this.isEmpty) {
      throw new EmptyContainerError('Deque is empty');
    }
    return this.#items[this.#left]!;
  }

  peekRight(): T {
    if (this.isEmpty) {
      throw new EmptyContainerError('Deque is empty');
    }
    return this.#items[this.#right]!;
  }

  dequeueLeft(): T {
    const item = this.peekLeft();
    this.#items[this.#left] = undefined; // Help GC
    this.#left = this.#increment(this.#left);
    this.#count--;
    return item;
  }

  dequeueRight(): T {
    const item = this.peekRight();
    this.#items[this.#right] = undefined; // Help GC
    this.#right = this.#decrement(this.#right);
    this.#count--;
    return item;
  }

  enqueueLeft(item: T, allowGrow: boolean = true): void {
    this.#ensureRoom(allowGrow);
    this.#left = this.#decrement(this.#left);
    this.#items[this.#left] = item;
    this.#count++;
  }

  enqueueRight(item: T, allowGrow: boolean = true): void {
    this.#ensureRoom(allowGrow);
    this.#right = this.#increment(this.#right);
    this.#items[this.#right] = item;
    this.#count++;
  }

  /**
   * Moves the elements into a new buffer of `newCapacity` slots, leftmost element at index 0.
   *
   * Throws without touching the deque if `newCapacity` is smaller than {@link count}.
   */
  reallocate(newCapacity: number): void {
    _checkCapacity(newCapacity);
    if (newCapacity < this.#count) {
      throw new StowageError(
        `Cannot reallocate ${this.#count} items into capacity ${newCapacity}`
      );
    }

    const oldItems = this.#items;
    const items: (T | undefined)[] = new Array(newCapacity);
    let next = 0;
    if (this.#count > 0) {
      if (this.#left <= this.#right) {
        for (let i = this.#left; i <= this.#right; i++) {
          items[next++] = oldItems[i];
        }
      } else {
        // wrapped: tail of the old buffer first, then its head
        for (let i = this.#left; i < oldItems.length; i++) {
          items[next++] = oldItems[i];
        }
        for (let i = 0; i <= this.#right; i++) {
          items[next++] = oldItems[i];
        }
      }
    }

    this.#items = items;
    this.#left = 0;
    this.#right = this.#count > 0 ? this.#count - 1 : this.#decrement(0);
  }

  toArray(): T[] {
    return Array.from(this);
  }

  clear(): void {
    this.#items.fill(undefined);
    this.#count = 0;
    this.#left = 0;
    this.#right = this.#decrement(0);
  }

  /**
   * Walks the live buffer. Mutating the deque while iterating is undefined behavior.
   */
  *[Symbol.iterator](): Iterator<T> {
    let index = this.#left;
    for (let i = 0; i < this.#count; i++) {
      yield this.#items[index]!;
      index = this.#increment(index);
    }
  }

  #ensureRoom(allowGrow: boolean): void {
    if (!this.isFull) {
      return;
    }
    if (!allowGrow) {
      throw new ContainerFullError('Deque is full');
    }
    this.reallocate(_grownCapacity(this.capacity));
  }

  #increment(index: number): number {
    return index === this.#items.length - 1 ? 0 : index + 1;
  }

  #decrement(index: number): number {
    return index === 0 ? this.#items.length - 1 : index - 1;
  }
}
