/**
 * tidy-tree-layout
 *
 * Linear-time tidy drawings of rooted, ordered n-ary trees
 *
 * @example
 * ```typescript
 * import { layoutTree, TreeLayouter } from 'tidy-tree-layout';
 *
 * // Integer grid coordinates: y is the depth
 * const { positions } = layoutTree(root);
 *
 * // Or drawing coordinates
 * const layouter = new TreeLayouter({ horizontalGap: 40, verticalGap: 60 });
 * const points = layouter.layout(root);
 * ```
 */

// Layout engine
export {
  layoutTree,
  childrenOf,
  TreeLayouter,
  LayoutNode,
  DEFAULT_SEPARATION,
  DEFAULT_TREE_LAYOUT_OPTIONS,
  type LayoutTreeOptions,
  type TreeLayout,
} from './layout';

// JSON converter
export { TidyTreeLayout, type LayoutedNode, type LayoutedTree } from './converter';

// Input builders
export {
  buildTree,
  flattenTree,
  parseTreeJson,
  validateTreeJson,
  type TreeDocument,
  type NestedTreeDocument,
  type AdjacencyTreeDocument,
} from './transform';

// Errors
export { TreeLayoutError, InvalidTreeError, TreeStructureError } from './errors';

// Types
export type {
  Point,
  Bounds,
  ChildAccessor,
  HasChildren,
  TreeNode,
  LayoutDirection,
  LayoutStats,
  TreeLayoutOptions,
} from './types';
