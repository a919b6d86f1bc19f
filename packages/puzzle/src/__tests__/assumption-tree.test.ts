import { describe, it, expect } from 'vitest';
import { AssumptionTree, ROOT } from '../assumption-tree.js';

function sampleTree(): AssumptionTree<string> {
  const tree = new AssumptionTree('root');
  const a = tree.insertChild(ROOT, 'a');
  tree.insertChild(ROOT, 'b');
  tree.insertChild(a, 'a1');
  tree.insertChild(a, 'a2');
  return tree;
}

describe('AssumptionTree', () => {
  it('hands out handles in insertion order', () => {
    const tree = sampleTree();
    expect(tree.size).toBe(5);
    expect(tree.get(ROOT)).toBe('root');
    expect(tree.get(3)).toBe('a1');
    expect(tree.childrenOf(ROOT)).toEqual([1, 2]);
    expect(tree.childrenOf(1)).toEqual([3, 4]);
    expect(tree.childrenOf(2)).toEqual([]);
  });

  it('links children back to their parent', () => {
    const tree = sampleTree();
    expect(tree.parentOf(ROOT)).toBeUndefined();
    expect(tree.parentOf(4)).toBe(1);
    expect(tree.pathTo(4)).toEqual([0, 1, 4]);
    expect(tree.pathTo(ROOT)).toEqual([0]);
  });

  it('walks depth-first with children in order', () => {
    const tree = sampleTree();
    const walked = [...tree.walk()].map((entry) => [entry.data, entry.depth]);
    expect(walked).toEqual([
      ['root', 0],
      ['a', 1],
      ['a1', 2],
      ['a2', 2],
      ['b', 1],
    ]);
  });

  it('walks a subtree from its own depth zero', () => {
    const tree = sampleTree();
    expect([...tree.walk(1)].map((entry) => entry.handle)).toEqual([1, 3, 4]);
  });

  it('validates user-supplied ids', () => {
    const tree = sampleTree();
    expect(tree.getHandle(4)).toEqual({ ok: true, value: 4 });
    for (const id of [5, -1, 1.5]) {
      const result = tree.getHandle(id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.target).toBe('tree-node');
      }
    }
    const missing = tree.getHandle(9);
    if (!missing.ok) {
      expect(missing.error.message).toBe('Node 9 does not exist');
    }
  });

  it('throws on a handle that was never looked up', () => {
    const tree = sampleTree();
    expect(() => tree.get(42)).toThrow('Invariant violated');
  });
});
