/**
 * Layout Node Model
 * Mirrors the caller's tree with nodes that carry the scratch fields of the
 * two layout passes. The input tree is only read.
 */

import { TreeStructureError } from '../../errors';
import type { ChildAccessor } from '../../types';

/**
 * A node of the layout tree.
 *
 * `x` holds the position relative to the parent during the first pass and the
 * absolute position after the second pass.
 */
export class LayoutNode<T> {
  readonly source: T;
  readonly parent: LayoutNode<T> | null;
  readonly children: LayoutNode<T>[] = [];
  /** Position among the siblings */
  readonly index: number;
  /** Depth from the root */
  readonly y: number;

  x = 0;
  /** Offset not yet applied to the descendants */
  mod = 0;
  /** Next node on the contour when there is no child on that side */
  thread: LayoutNode<T> | null = null;
  /** Sibling-level representative used to attribute conflicts */
  ancestor: LayoutNode<T>;
  // Pending even-spacing bookkeeping, applied by the parent in one sweep
  change = 0;
  shift = 0;

  constructor(source: T, parent: LayoutNode<T> | null, index: number) {
    this.source = source;
    this.parent = parent;
    this.index = index;
    this.y = parent ? parent.y + 1 : 0;
    this.ancestor = this;
  }

  get isLeaf(): boolean {
    return this.children.length === 0;
  }

  get firstChild(): LayoutNode<T> | undefined {
    return this.children[0];
  }

  get lastChild(): LayoutNode<T> | undefined {
    return this.children[this.children.length - 1];
  }

  /**
   * The sibling directly to the left, if any
   */
  get leftSibling(): LayoutNode<T> | undefined {
    if (!this.parent || this.index === 0) return undefined;
    return this.parent.children[this.index - 1];
  }
}

/**
 * The layout tree built from an input tree
 */
export interface LayoutTree<T> {
  root: LayoutNode<T>;
  /** All nodes in pre-order */
  nodes: LayoutNode<T>[];
  /** Depth of the deepest node */
  depth: number;
}

/**
 * Build the layout tree for an input tree, top-down with an explicit stack.
 * Input nodes are identified by reference: reaching one twice means the input
 * has a cycle or a shared subtree.
 */
export function buildLayoutTree<T>(root: T, getChildren: ChildAccessor<T>): LayoutTree<T> {
  const visited = new Set<T>([root]);
  const layoutRoot = new LayoutNode(root, null, 0);
  const nodes: LayoutNode<T>[] = [];
  const stack: LayoutNode<T>[] = [layoutRoot];
  let depth = 0;

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    nodes.push(node);
    depth = Math.max(depth, node.y);

    const sources = getChildren(node.source) ?? [];
    for (let i = 0; i < sources.length; i++) {
      const source = sources[i];
      if (visited.has(source)) {
        throw new TreeStructureError(node.y + 1);
      }
      visited.add(source);
      node.children.push(new LayoutNode(source, node, i));
    }

    // Push right-to-left so the leftmost child is visited first
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }

  return { root: layoutRoot, nodes, depth };
}
