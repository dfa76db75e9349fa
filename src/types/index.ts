/**
 * Public types shared by the layout engine, the builders and the CLI.
 */

// ============================================================================
// Basic Geometry Types
// ============================================================================

/**
 * A point in 2D space
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * A rectangle in 2D space
 */
export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ============================================================================
// Input Types
// ============================================================================

/**
 * Returns the ordered children of an input node. An empty array or
 * `undefined` marks a leaf.
 */
export type ChildAccessor<T> = (node: T) => readonly T[] | undefined;

/**
 * Any input node that carries its own ordered children.
 */
export interface HasChildren<T> {
  children?: readonly T[];
}

/**
 * A tree node as read from a JSON document
 */
export interface TreeNode {
  id: string;
  children: TreeNode[];
}

// ============================================================================
// Layout Types
// ============================================================================

/**
 * Direction in which the tree grows from its root
 */
export type LayoutDirection = 'DOWN' | 'RIGHT';

/**
 * Operation counters collected during one layout run
 */
export interface LayoutStats {
  /** Number of nodes laid out */
  nodeCount: number;
  /** Depth of the deepest node (root = 0) */
  depth: number;
  /** Steps taken along contours while separating subtrees */
  contourSteps: number;
  /** Times a subtree had to be moved to resolve a conflict */
  conflictShifts: number;
  /** Threads installed between contours */
  threads: number;
}

/**
 * Options for TreeLayouter
 */
export interface TreeLayoutOptions {
  /**
   * Horizontal drawing distance: one sibling grid unit when the tree grows
   * DOWN, one depth level when it grows RIGHT
   */
  horizontalGap: number;
  /**
   * Vertical drawing distance: one depth level when the tree grows DOWN,
   * one sibling grid unit when it grows RIGHT
   */
  verticalGap: number;
  /** Direction of tree expansion */
  direction: LayoutDirection;
  /** Minimum distance, in grid units, between neighbouring nodes on one level */
  separation: number;
}
