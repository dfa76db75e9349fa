/**
 * Tree builders for layout tests
 */

import type { TreeNode } from '../../src/types';

/**
 * Build a node with the given children
 */
export function node(id: string, ...children: TreeNode[]): TreeNode {
  return { id, children };
}

/**
 * A chain of `length` nodes below a root, each the only child of the previous one
 */
export function chain(prefix: string, length: number): TreeNode {
  const root = node(`${prefix}0`);
  let current = root;
  for (let i = 1; i <= length; i++) {
    const next = node(`${prefix}${i}`);
    current.children.push(next);
    current = next;
  }
  return root;
}

/**
 * A complete tree where every inner node has `branching` children
 */
export function completeTree(branching: number, depth: number): TreeNode {
  let counter = 0;
  const root = node(`n${counter++}`);
  let level = [root];
  for (let d = 0; d < depth; d++) {
    const next: TreeNode[] = [];
    for (const parent of level) {
      for (let i = 0; i < branching; i++) {
        const child = node(`n${counter++}`);
        parent.children.push(child);
        next.push(child);
      }
    }
    level = next;
  }
  return root;
}

/**
 * Deterministic pseudo-random generator (LCG) so that failures reproduce
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

/**
 * A random tree of `size` nodes: each new node is attached to one of the
 * existing nodes, appended after its current children
 */
export function randomTree(size: number, seed: number, maxChildren = 4): TreeNode {
  const random = createRandom(seed);
  const root = node('r0');
  const nodes = [root];
  for (let i = 1; i < size; i++) {
    let parent = nodes[Math.floor(random() * nodes.length)];
    while (parent.children.length >= maxChildren) {
      parent = nodes[Math.floor(random() * nodes.length)];
    }
    const child = node(`r${i}`);
    parent.children.push(child);
    nodes.push(child);
  }
  return root;
}

/**
 * Nodes grouped by depth, each level in left-to-right order
 */
export function levelsOf(root: TreeNode): TreeNode[][] {
  const levels: TreeNode[][] = [];
  let level = [root];
  while (level.length > 0) {
    levels.push(level);
    level = level.flatMap((n) => n.children);
  }
  return levels;
}

/**
 * Pre-order list of a subtree
 */
export function preOrder(root: TreeNode): TreeNode[] {
  return [root, ...root.children.flatMap(preOrder)];
}
