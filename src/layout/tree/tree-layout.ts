/**
 * Tidy tree layout on the unit grid.
 *
 * Places every node of a rooted, ordered tree at integer coordinates in
 * linear time: y is the depth, x keeps siblings in order, at least
 * `separation` apart on every level, with each parent centered over its
 * children and identical subtrees drawn identically wherever they occur.
 */

import { InvalidTreeError } from '../../errors';
import type { ChildAccessor, HasChildren, LayoutStats, Point } from '../../types';
import { debugLog } from '../../utils/debug';
import { firstWalk } from './first-walk';
import { buildLayoutTree, type LayoutNode } from './layout-node';
import { secondWalk } from './second-walk';

export interface LayoutTreeOptions<T> {
  /** Reads the ordered children of an input node; defaults to its `children` property */
  getChildren?: ChildAccessor<T>;
  /** Minimum distance between neighbouring nodes on one level, a positive integer */
  separation?: number;
}

/**
 * Result of a layout run
 */
export interface TreeLayout<T> {
  root: LayoutNode<T>;
  /** Every layout node in pre-order */
  nodes: LayoutNode<T>[];
  /** Final grid position of every input node */
  positions: Map<T, Point>;
  stats: LayoutStats;
  /** Distance between the leftmost and the rightmost node */
  width: number;
  /** Depth of the deepest node */
  height: number;
}

export const DEFAULT_SEPARATION = 1;

/**
 * Lay out a tree whose nodes carry their own `children` arrays.
 *
 * @example
 * ```typescript
 * interface Item { name: string; children?: Item[] }
 *
 * const layout = layoutTree<Item>({ name: 'root', children: [{ name: 'a' }, { name: 'b' }] });
 * layout.root.x; // 1
 * ```
 */
export function layoutTree<T extends HasChildren<T>>(
  root: T | null | undefined,
  options?: Omit<LayoutTreeOptions<T>, 'getChildren'>
): TreeLayout<T>;
/**
 * Lay out any tree, reading children through `getChildren`.
 */
export function layoutTree<T>(
  root: T | null | undefined,
  options: LayoutTreeOptions<T> & { getChildren: ChildAccessor<T> }
): TreeLayout<T>;
export function layoutTree<T>(
  root: T | null | undefined,
  options: LayoutTreeOptions<T> = {}
): TreeLayout<T> {
  if (root === null || root === undefined) {
    throw new InvalidTreeError('Cannot lay out an empty tree: no root node given');
  }

  const separation = options.separation ?? DEFAULT_SEPARATION;
  if (!Number.isInteger(separation) || separation < 1) {
    throw new InvalidTreeError(`separation must be a positive integer, got ${separation}`);
  }

  const tree = buildLayoutTree<T>(root, options.getChildren ?? childrenOf);
  const stats: LayoutStats = {
    nodeCount: tree.nodes.length,
    depth: tree.depth,
    contourSteps: 0,
    conflictShifts: 0,
    threads: 0,
  };

  firstWalk(tree.root, { separation, stats });
  secondWalk(tree.root);

  const positions = new Map<T, Point>();
  let minX = Infinity;
  let maxX = -Infinity;
  for (const node of tree.nodes) {
    positions.set(node.source, { x: node.x, y: node.y });
    minX = Math.min(minX, node.x);
    maxX = Math.max(maxX, node.x);
  }

  debugLog(
    'tree-layout',
    `${stats.nodeCount} nodes, depth ${stats.depth}: ${stats.contourSteps} contour steps, ` +
      `${stats.conflictShifts} conflict shifts, ${stats.threads} threads`
  );

  return {
    root: tree.root,
    nodes: tree.nodes,
    positions,
    stats,
    width: maxX - minX,
    height: tree.depth,
  };
}

/**
 * Default child accessor: the node's own `children` array, if it has one
 */
export function childrenOf<T>(node: T): readonly T[] | undefined {
  if (typeof node !== 'object' || node === null || !('children' in node)) {
    return undefined;
  }
  const { children } = node;
  return Array.isArray(children) ? children : undefined;
}
