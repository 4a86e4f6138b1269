import {
  type Comparator,
  type Container,
  EmptyContainerError,
  type Ordered,
  _defaultOrder,
} from './common';

/**
 * A stack that reports its minimum in O(1).
 *
 * @example
 * ```typescript
 * const stack = newMinStack<number>();
 * stack.push(5);
 * stack.push(2);
 * stack.min(); // 2
 * stack.pop();
 * stack.min(); // 5
 * ```
 *
 * @category Data Structure
 * @summary Stack with constant-time minimum.
 */
export interface MinStack<T> extends Container, Iterable<T> {
  push(item: T): void;
  /** remove and return the top element, or throw if empty */
  pop(): T;
  /** the top element, or throw if empty */
  peek(): T;
  /** the smallest element per the comparator, or throw if empty */
  min(): T;
}

/**
 * Creates a new empty {@link MinStack}. Elements other than {@link Ordered} ones need a comparator.
 *
 * @category Data Structure
 */
export function newMinStack<T extends Ordered>(
  comparator?: Comparator<T>
): MinStack<T>;
export function newMinStack<T>(comparator: Comparator<T>): MinStack<T>;
export function newMinStack<T>(comparator?: Comparator<T>): MinStack<T> {
  return new ShadowMinStack<T>(comparator ?? _defaultOrder<T>());
}

/**
 * Every push also pushes the running minimum onto a shadow stack, and every pop pops both.
 */
export class ShadowMinStack<T> implements MinStack<T> {
  #items: T[] = [];
  #minimums: T[] = [];
  #comparator: Comparator<T>;

  constructor(comparator: Comparator<T>) {
    this.#comparator = comparator;
  }

  get count(): number {
    return this.#items.length;
  }

  get isEmpty(): boolean {
    return this.#items.length === 0;
  }

  push(item: T): void {
    this.#items.push(item);
    if (this.#minimums.length === 0) {
      this.#minimums.push(item);
      return;
    }
    const current = this.#minimums[this.#minimums.length - 1]!;
    // ties keep the earlier minimum
    this.#minimums.push(this.#comparator(item, current) < 0 ? item : current);
  }

  pop(): T {
    const item = this.peek();
    this.#items.pop();
    this.#minimums.pop();
    return item;
  }

  peek(): T {
    if (this.isEmpty) {
      throw new EmptyContainerError('Stack is empty');
    }
    return this.#items[this.#items.length - 1]!;
  }

  min(): T {
    if (this.isEmpty) {
      throw new EmptyContainerError('Stack is empty');
    }
    return this.#minimums[this.#minimums.length - 1]!;
  }

  /** top to bottom */
  *[Symbol.iterator](): Iterator<T> {
    for (let i = this.#items.length - 1; i >= 0; i--) {
      yield this.#items[i]!;
    }
  }
}
