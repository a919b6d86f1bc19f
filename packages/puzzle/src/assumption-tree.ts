/**
 * Assumption Tree - arena of search states
 *
 * Nodes live in one array and refer to each other by index. Nothing is ever
 * removed: going back means moving a cursor elsewhere.
 */

import { InvariantViolationError, LookupError, err, ok, type Result } from '@runelock/core';

export type NodeHandle = number;

interface TreeNode<T> {
  parent: NodeHandle | undefined;
  children: NodeHandle[];
  data: T;
}

export interface TreeEntry<T> {
  handle: NodeHandle;
  depth: number;
  data: T;
}

export const ROOT: NodeHandle = 0;

export class AssumptionTree<T> {
  private readonly nodes: TreeNode<T>[];

  constructor(root: T) {
    this.nodes = [{ parent: undefined, children: [], data: root }];
  }

  get size(): number {
    return this.nodes.length;
  }

  insertChild(parent: NodeHandle, data: T): NodeHandle {
    const handle = this.nodes.length;
    this.nodes.push({ parent, children: [], data });
    this.node(parent).children.push(handle);
    return handle;
  }

  /** Turn a user-supplied id into a handle */
  getHandle(id: number): Result<NodeHandle, LookupError> {
    if (!Number.isInteger(id) || id < 0 || id >= this.nodes.length) {
      return err(new LookupError('tree-node', id));
    }
    return ok(id);
  }

  get(handle: NodeHandle): T {
    return this.node(handle).data;
  }

  parentOf(handle: NodeHandle): NodeHandle | undefined {
    return this.node(handle).parent;
  }

  childrenOf(handle: NodeHandle): readonly NodeHandle[] {
    return this.node(handle).children;
  }

  /** Handles from the root down to `handle`, inclusive */
  pathTo(handle: NodeHandle): NodeHandle[] {
    const path: NodeHandle[] = [];
    let current: NodeHandle | undefined = handle;
    while (current !== undefined) {
      path.unshift(current);
      current = this.parentOf(current);
    }
    return path;
  }

  /** Depth-first, children in insertion order */
  *walk(from: NodeHandle = ROOT): Generator<TreeEntry<T>> {
    const stack: Array<{ handle: NodeHandle; depth: number }> = [{ handle: from, depth: 0 }];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined) break;
      const node = this.node(next.handle);
      yield { handle: next.handle, depth: next.depth, data: node.data };
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({ handle: node.children[i], depth: next.depth + 1 });
      }
    }
  }

  private node(handle: NodeHandle): TreeNode<T> {
    const node = this.nodes[handle];
    if (node === undefined) {
      throw new InvariantViolationError(`tree node ${handle} was used without being looked up`);
    }
    return node;
  }
}
