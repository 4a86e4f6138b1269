/**
 * @categoryDescription Data Structure
 * In-memory containers.
 * @module
 */
export {
  newDeque,
  RingDeque,
  type Deque,
  type DequeOptions,
} from './deque';
export {
  newHeap,
  BinaryHeap,
  type Heap,
  type HeapOptions,
} from './heap';
export { newTrie, SequenceTrie, type Trie, type TrieNode } from './trie';
export { newMinStack, ShadowMinStack, type MinStack } from './min-stack';
export {
  StowageError,
  EmptyContainerError,
  ContainerFullError,
  naturalOrder,
  reverseOrder,
  type Comparator,
  type Ordered,
  type Container,
  type BoundedContainer,
} from './common';
