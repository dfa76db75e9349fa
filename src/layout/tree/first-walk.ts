/**
 * First-Pass Placer
 * Post-order walk that places every node relative to its parent.
 */

import type { LayoutNode } from './layout-node';
import { executeShifts, separateSubtree, type SeparationContext } from './separator';

/**
 * Compute preliminary x-coordinates bottom-up.
 *
 * Uses an explicit stack so that degenerate trees (depth close to the node
 * count) do not exhaust the call stack.
 */
export function firstWalk<T>(root: LayoutNode<T>, context: SeparationContext): void {
  const stack: Array<{ node: LayoutNode<T>; expanded: boolean }> = [{ node: root, expanded: false }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame.expanded && !frame.node.isLeaf) {
      frame.expanded = true;
      for (let i = frame.node.children.length - 1; i >= 0; i--) {
        stack.push({ node: frame.node.children[i], expanded: false });
      }
      continue;
    }

    stack.pop();
    placeChildren(frame.node, context);
  }
}

/**
 * Merge the (already placed) children of `node` left to right and center
 * `node` over them. A leaf stays at x = 0.
 */
function placeChildren<T>(node: LayoutNode<T>, context: SeparationContext): void {
  const first = node.firstChild;
  const last = node.lastChild;
  if (!first || !last) {
    node.x = 0;
    return;
  }

  let defaultAncestor = first;
  for (let i = 1; i < node.children.length; i++) {
    const child = node.children[i];
    const left = node.children[i - 1];

    // Put the child next to its left sibling; its descendants follow via mod
    const target = left.x + context.separation;
    child.mod += target - child.x;
    child.x = target;

    defaultAncestor = separateSubtree(child, left, defaultAncestor, context);
  }

  executeShifts(node);
  node.x = (first.x + last.x) / 2;
  node.mod = 0;
}
