import { describe, expect, test } from 'vitest';
import { newTrie, SequenceTrie } from './trie';

const chars = (word: string): string[] => [...word];

describe('SequenceTrie', () => {
  test('search finds only stored sequences, searchPrefix finds any prefix', () => {
    const trie = new SequenceTrie<string>();
    trie.insert(['c', 'a', 't']);
    trie.insert(['c', 'a', 'r']);

    expect(trie.search(['c', 'a', 't'])?.terminal).toBe(true);
    expect(trie.search(['c', 'a'])).toBeUndefined();

    const prefix = trie.searchPrefix(['c', 'a']);
    expect(prefix).toBeDefined();
    expect(prefix?.terminal).toBe(false);
    expect([...(prefix?.children.keys() ?? [])]).toEqual(['t', 'r']);
  });

  test('missing keys yield undefined', () => {
    const trie = new SequenceTrie<string>();
    trie.insert(chars('dog'));
    expect(trie.search(chars('dot'))).toBeUndefined();
    expect(trie.searchPrefix(chars('dx'))).toBeUndefined();
    expect(trie.search(chars('doge'))).toBeUndefined();
    expect(trie.has(chars('dog'))).toBe(true);
    expect(trie.hasPrefix(chars('do'))).toBe(true);
    expect(trie.hasPrefix(chars('e'))).toBe(false);
  });

  test('the empty sequence is stored at the root', () => {
    const trie = new SequenceTrie<string>();
    expect(trie.search([])).toBeUndefined();
    expect(trie.searchPrefix([])).toBe(trie.root);

    trie.insert([]);
    expect(trie.search([])).toBe(trie.root);
    expect(trie.size).toBe(1);
    expect(trie.remove([])).toBe(true);
    expect(trie.root.terminal).toBe(false);
    expect(trie.size).toBe(0);
  });

  test('inserting twice leaves the trie unchanged', () => {
    const trie = new SequenceTrie<string>();
    trie.insert(chars('cat'));
    const node = trie.search(chars('cat'));
    trie.insert(chars('cat'));

    expect(trie.search(chars('cat'))).toBe(node);
    expect(trie.size).toBe(1);
    expect(trie.root.children.size).toBe(1);
    expect(trie.searchPrefix(chars('ca'))?.children.size).toBe(1);
  });

  test('removing the only sequence prunes every node below the root', () => {
    const trie = new SequenceTrie<string>();
    trie.insert(['c', 'a', 't']);
    expect(trie.remove(['c', 'a', 't'])).toBe(true);
    expect(trie.root.children.size).toBe(0);
    expect(trie.size).toBe(0);
  });

  test('removal prunes only the dead branch', () => {
    const trie = new SequenceTrie<string>();
    trie.insert(['c', 'a', 't']);
    trie.insert(['c', 'a', 'r']);

    expect(trie.remove(['c', 'a', 't'])).toBe(true);
    expect(trie.search(['c', 'a', 't'])).toBeUndefined();
    expect(trie.search(['c', 'a', 'r'])?.terminal).toBe(true);
    expect([...(trie.searchPrefix(['c', 'a'])?.children.keys() ?? [])]).toEqual(
      ['r']
    );
  });

  test('pruning stops at a terminal ancestor', () => {
    const trie = new SequenceTrie<string>();
    trie.insert(chars('ca'));
    trie.insert(chars('cart'));

    expect(trie.remove(chars('cart'))).toBe(true);
    const ca = trie.search(chars('ca'));
    expect(ca?.terminal).toBe(true);
    expect(ca?.children.size).toBe(0);
    expect(trie.size).toBe(1);
  });

  test('removing an inner sequence keeps its descendants', () => {
    const trie = new SequenceTrie<string>();
    trie.insert(chars('ca'));
    trie.insert(chars('cat'));

    expect(trie.remove(chars('ca'))).toBe(true);
    expect(trie.search(chars('ca'))).toBeUndefined();
    expect(trie.has(chars('cat'))).toBe(true);
    expect(trie.searchPrefix(chars('ca'))?.children.size).toBe(1);
  });

  test('removing a missing sequence or a bare prefix changes nothing', () => {
    const trie = new SequenceTrie<string>();
    trie.insert(chars('cat'));

    expect(trie.remove(chars('cow'))).toBe(false);
    expect(trie.remove(chars('ca'))).toBe(false);
    expect(trie.remove(chars('cats'))).toBe(false);
    expect(trie.has(chars('cat'))).toBe(true);
    expect(trie.hasPrefix(chars('ca'))).toBe(true);
    expect(trie.size).toBe(1);
  });

  test('repeated insert and remove cycles leave no nodes behind', () => {
    const trie = new SequenceTrie<number>();
    for (let round = 0; round < 10; round++) {
      trie.insert([round, round + 1, round + 2]);
      trie.insert([round, round + 1]);
      expect(trie.remove([round, round + 1, round + 2])).toBe(true);
      expect(trie.remove([round, round + 1])).toBe(true);
    }
    expect(trie.root.children.size).toBe(0);
    expect(trie.size).toBe(0);
  });

  test('keys of any type are compared by identity', () => {
    const red = { color: 'red' };
    const blue = { color: 'blue' };
    const trie = new SequenceTrie<object>();
    trie.insert([red, blue]);

    expect(trie.has([red, blue])).toBe(true);
    expect(trie.has([{ color: 'red' }, blue])).toBe(false);
  });

  test('sequences enumerates stored sequences below a prefix', () => {
    const trie = new SequenceTrie<string>();
    for (const word of ['car', 'cat', 'ca', 'dog']) {
      trie.insert(word);
    }

    expect([...trie.sequences()].map(s => s.join(''))).toEqual([
      'ca',
      'car',
      'cat',
      'dog',
    ]);
    expect([...trie.sequences('ca')].map(s => s.join(''))).toEqual([
      'ca',
      'car',
      'cat',
    ]);
    expect([...trie.sequences('x')]).toEqual([]);
  });

  test('newTrie creates an empty trie', () => {
    const trie = newTrie<number>();
    expect(trie.size).toBe(0);
    expect(trie.root.children.size).toBe(0);
    trie.insert([1, 2]);
    expect(trie.has([1, 2])).toBe(true);
  });
});
