import {
  _checkCapacity,
  _grownCapacity,
  type BoundedContainer,
  type Comparator,
  ContainerFullError,
  DEFAULT_CAPACITY,
  EmptyContainerError,
  type Ordered,
  StowageError,
  _defaultOrder,
} from './common';

/**
 * A priority queue over a fixed number of slots. `push` doubles the slots when they run out,
 * unless the caller forbids it; the comparator decides whether the root is the minimum or the maximum.
 *
 * @category Data Structure
 * @summary Bounded, growable priority queue.
 */
export interface Heap<Value> extends BoundedContainer {
  /** Insert an element, growing if full and `allowGrow` is set, otherwise throw */
  push(value: Value, allowGrow?: boolean): void;
  /** Remove and return the highest priority element, or throw if empty */
  pop(): Value;
  /** Peek at the highest priority element without removing it, or throw if empty */
  peek(): Value;
  /**
   * The ordering of the heap. Replacing it does not re-heapify: only replace it while
   * the heap is empty or already ordered by the new comparator.
   */
  comparator: Comparator<Value>;
  /** Pop every element, in priority order */
  drain(): Generator<Value, void, undefined>;
  /** Copy of the elements in storage order, which is not sorted */
  toArray(): Value[];
  /** Remove every element, keeping the capacity */
  clear(): void;
}

/**
 * @inline
 */
export interface HeapOptions<Value> {
  /** initial number of slots. Defaults to 16. */
  capacity?: number;
  /** defaults to {@link naturalOrder} for {@link Ordered} values, which makes a min-heap */
  comparator?: Comparator<Value>;
}

/**
 * Creates a new empty {@link Heap}.
 *
 * @example
 * ```typescript
 * const maxHeap = newHeap<number>({ comparator: (a, b) => b - a });
 * maxHeap.push(3);
 * maxHeap.push(8);
 * maxHeap.pop(); // 8
 * ```
 *
 * @category Data Structure
 */
export function newHeap<Value extends Ordered>(
  options?: HeapOptions<Value>
): Heap<Value>;
export function newHeap<Value>(
  options: HeapOptions<Value> & { comparator: Comparator<Value> }
): Heap<Value>;
export function newHeap<Value>(options?: HeapOptions<Value>): Heap<Value> {
  return new BinaryHeap<Value>(
    options?.comparator ?? _defaultOrder<Value>(),
    options?.capacity ?? DEFAULT_CAPACITY
  );
}

/**
 * Array-backed {@link Heap}: children of slot `i` live at `2i + 1` and `2i + 2`.
 * @category Data Structure
 */
export class BinaryHeap<Value> implements Heap<Value> {
  #data: (Value | undefined)[];
  #count: number = 0;
  #comparator: Comparator<Value>;

  constructor(
    comparator: Comparator<Value>,
    capacity: number = DEFAULT_CAPACITY
  ) {
    _checkCapacity(capacity);
    this.#comparator = comparator;
    this.#data = new Array(capacity);
  }

  get comparator(): Comparator<Value> {
    return this.#comparator;
  }

  set comparator(comparator: Comparator<Value>) {
    this.#comparator = comparator;
  }

  get capacity(): number {
    return this.#data.length;
  }

  get count(): number {
    return this.#count;
  }

  get isEmpty(): boolean {
    return this.#count === 0;
  }

  get isFull(): boolean {
    return this.#count >= this.#data.length;
  }

  push(value: Value, allowGrow: boolean = true): void {
    if (this.isFull) {
      if (!allowGrow) {
        throw new ContainerFullError('Heap is full');
      }
      this.reallocate(_grownCapacity(this.capacity));
    }
    this.#data[this.#count] = value;
    this.#count++;
    this.#heapifyUp(this.#count - 1);
  }

  pop(): Value {
    const root = this.peek();
    const last = this.#count - 1;
    this.#data[0] = this.#data[last];
    this.#data[last] = undefined; // Help GC
    this.#count--;
    this.#heapifyDown(0);
    return root;
  }

  peek(): Value {
    if (this.isEmpty) {
      throw new EmptyContainerError('Heap is empty');
    }
    return this.#data[0]!;
  }

  /**
   * Resizes the backing storage. Elements keep their indices.
   *
   * Throws without touching the heap if `newCapacity` is smaller than {@link count}.
   */
  reallocate(newCapacity: number): void {
    _checkCapacity(newCapacity);
    if (newCapacity < this.#count) {
      throw new StowageError(
        `Cannot reallocate ${this.#count} items into capacity ${newCapacity}`
      );
    }
    const data: (Value | undefined)[] = new Array(newCapacity);
    for (let i = 0; i < this.#count; i++) {
      data[i] = this.#data[i];
    }
    this.#data = data;
  }

  *drain(): Generator<Value, void, undefined> {
    while (!this.isEmpty) {
      yield this.pop();
    }
  }

  toArray(): Value[] {
    const result: Value[] = [];
    for (let i = 0; i < this.#count; i++) {
      result.push(this.#data[i]!);
    }
    return result;
  }

  clear(): void {
    this.#data.fill(undefined);
    this.#count = 0;
  }

  #heapifyUp(index: number): void {
    const item = this.#data[index]!;
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      const parent = this.#data[parentIndex]!;
      if (this.#comparator(item, parent) >= 0) {
        break;
      }
      // move the parent down; the item lands once its slot is known
      this.#data[index] = parent;
      index = parentIndex;
    }
    this.#data[index] = item;
  }

  #heapifyDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;

      if (leftChild >= this.#count) {
        break;
      }

      // ties go to the left child
      const childIndex =
        rightChild < this.#count &&
        this.#comparator(this.#data[rightChild]!, this.#data[leftChild]!) < 0
          ? rightChild
          : leftChild;

      if (this.#comparator(this.#data[childIndex]!, this.#data[index]!) >= 0) {
        break;
      }

      this.#swap(index, childIndex);
      index = childIndex;
    }
  }

  #swap(i: number, j: number): void {
    const held = this.#data[i];
    this.#data[i] = this.#data[j];
    this.#data[j] = held;
  }
}
