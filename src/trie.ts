/**
 * Read-only view of a trie node, as returned by {@link Trie.search} and {@link Trie.searchPrefix}.
 *
 * @category Data Structure
 */
export interface TrieNode<K> {
  /** whether a stored sequence ends at this node */
  readonly terminal: boolean;
  readonly children: ReadonlyMap<K, TrieNode<K>>;
}

/**
 * A prefix tree over sequences of keys. Keys are compared the way `Map` compares them
 * (SameValueZero), so any key type works: characters, tokens, numbers, object identities.
 *
 * @example
 * ```typescript
 * const trie = newTrie<string>();
 * trie.insert('cat');
 * trie.insert('car');
 * trie.has('ca'); // false
 * trie.hasPrefix('ca'); // true
 * [...trie.sequences(['c'])]; // [['c', 'a', 't'], ['c', 'a', 'r']]
 * ```
 *
 * @category Data Structure
 * @summary Prefix tree over arbitrary key sequences.
 */
export interface Trie<K> {
  readonly root: TrieNode<K>;
  /** the number of stored sequences */
  readonly size: number;
  /** store a sequence; storing it again changes nothing */
  insert(sequence: Iterable<K>): void;
  /** remove a stored sequence, or return false without changing anything */
  remove(sequence: Iterable<K>): boolean;
  /** the terminal node of `sequence`, or undefined if it is not stored */
  search(sequence: Iterable<K>): TrieNode<K> | undefined;
  /** the node at the end of `prefix`, terminal or not, or undefined if no stored sequence starts with it */
  searchPrefix(prefix: Iterable<K>): TrieNode<K> | undefined;
  has(sequence: Iterable<K>): boolean;
  hasPrefix(prefix: Iterable<K>): boolean;
  /** the stored sequences starting with `prefix`, each a fresh array including the prefix */
  sequences(prefix?: Iterable<K>): Generator<K[], void, undefined>;
}

/**
 * Creates a new empty {@link Trie}.
 *
 * @category Data Structure
 */
export function newTrie<K>(): Trie<K> {
  return new SequenceTrie<K>();
}

class Node<K> implements TrieNode<K> {
  terminal: boolean = false;
  readonly children: Map<K, Node<K>> = new Map();
}

/**
 * Nodes are created lazily on {@link insert} and pruned on {@link remove}: no childless,
 * non-terminal node outlives the operation that made it so.
 */
export class SequenceTrie<K> implements Trie<K> {
  readonly #root: Node<K> = new Node();
  #size: number = 0;

  get root(): TrieNode<K> {
    return this.#root;
  }

  get size(): number {
    return this.#size;
  }

  insert(sequence: Iterable<K>): void {
    let node = this.#root;
    for (const key of sequence) {
      let child = node.children.get(key);
      if (child === undefined) {
        child = new Node();
        node.children.set(key, child);
      }
      node = child;
    }
    if (!node.terminal) {
      node.terminal = true;
      this.#size++;
    }
  }

  /**
   * Removes a stored sequence and prunes the branch it leaves dead.
   *
   * @returns `false`, without changing anything, if the sequence was not stored.
   */
  remove(sequence: Iterable<K>): boolean {
    const path: [key: K, parent: Node<K>][] = [];
    let node = this.#root;
    for (const key of sequence) {
      const child = node.children.get(key);
      if (child === undefined) {
        return false;
      }
      path.push([key, node]);
      node = child;
    }

    if (!node.terminal) {
      return false;
    }
    node.terminal = false;
    this.#size--;

    while (path.length > 0 && node.children.size === 0 && !node.terminal) {
      const [key, parent] = path.pop()!;
      parent.children.delete(key);
      node = parent;
    }
    return true;
  }

  search(sequence: Iterable<K>): TrieNode<K> | undefined {
    const node = this.#walk(sequence);
    return node?.terminal ? node : undefined;
  }

  searchPrefix(prefix: Iterable<K>): TrieNode<K> | undefined {
    return this.#walk(prefix);
  }

  has(sequence: Iterable<K>): boolean {
    return this.search(sequence) !== undefined;
  }

  hasPrefix(prefix: Iterable<K>): boolean {
    return this.searchPrefix(prefix) !== undefined;
  }

  /**
   * Enumerates the stored sequences starting with `prefix`, depth first, visiting children
   * in the order they were first inserted. Each sequence is a fresh array that includes the prefix.
   */
  *sequences(prefix: Iterable<K> = []): Generator<K[], void, undefined> {
    const start = Array.from(prefix);
    const node = this.#walk(start);
    if (node === undefined) {
      return;
    }
    yield* collect(node, start);
  }

  #walk(sequence: Iterable<K>): Node<K> | undefined {
    let node = this.#root;
    for (const key of sequence) {
      const child = node.children.get(key);
      if (child === undefined) {
        return undefined;
      }
      node = child;
    }
    return node;
  }
}

function* collect<K>(
  node: Node<K>,
  path: K[]
): Generator<K[], void, undefined> {
  if (node.terminal) {
    yield [...path];
  }
  for (const [key, child] of node.children) {
    path.push(key);
    yield* collect(child, path);
    path.pop();
  }
}
