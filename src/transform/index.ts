/**
 * Input builders: adjacency maps and JSON documents to trees.
 */

export { buildTree, flattenTree } from './tree-builder';
export {
  parseTreeJson,
  validateTreeJson,
  isAdjacencyDocument,
  type TreeDocument,
  type NestedTreeDocument,
  type AdjacencyTreeDocument,
} from './json-tree';
