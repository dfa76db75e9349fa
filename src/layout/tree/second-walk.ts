/**
 * Second-Pass Resolver
 * Pre-order walk that folds the pending modifiers into absolute x-coordinates.
 */

import type { LayoutNode } from './layout-node';

/**
 * Compute final positions top-down: each node's x grows by the sum of the
 * `mod` of its strict ancestors. Threads are dropped on the way.
 */
export function secondWalk<T>(root: LayoutNode<T>): void {
  const stack: Array<{ node: LayoutNode<T>; modSum: number }> = [{ node: root, modSum: 0 }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, modSum } = frame;

    node.x += modSum;
    node.thread = null;

    const childModSum = modSum + node.mod;
    for (const child of node.children) {
      stack.push({ node: child, modSum: childModSum });
    }
  }
}
