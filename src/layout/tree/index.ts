/**
 * Tree Layout Module
 * Linear-time tidy layout for rooted, ordered n-ary trees.
 */

export {
  layoutTree,
  childrenOf,
  DEFAULT_SEPARATION,
  type LayoutTreeOptions,
  type TreeLayout,
} from './tree-layout';
export { TreeLayouter } from './tree-layouter';
export { LayoutNode, buildLayoutTree, type LayoutTree } from './layout-node';
export { ContourCursor, nextOnContour, type ContourSide } from './contour';
export { separateSubtree, moveSubtree, executeShifts, type SeparationContext } from './separator';
export { firstWalk } from './first-walk';
export { secondWalk } from './second-walk';
