/**
 * Tree Builder
 * Builds nested tree nodes from a flat adjacency map.
 */

import { InvalidTreeError, TreeStructureError } from '../errors';
import type { TreeNode } from '../types';

/**
 * Build a tree structure from an adjacency map
 * @param rootId The ID of the root node
 * @param edgeMap Map of node ID to the ordered IDs of its children
 * @throws TreeStructureError when a node is reached twice
 */
export function buildTree(rootId: string, edgeMap: Map<string, readonly string[]>): TreeNode {
  if (rootId.length === 0) {
    throw new InvalidTreeError('Root id must not be empty');
  }

  const root: TreeNode = { id: rootId, children: [] };
  const visited = new Set<string>([rootId]);
  const stack: Array<{ node: TreeNode; depth: number }> = [{ node: root, depth: 0 }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, depth } = frame;

    for (const childId of edgeMap.get(node.id) ?? []) {
      if (visited.has(childId)) {
        throw new TreeStructureError(
          depth + 1,
          `Node "${childId}" is reached twice (from "${node.id}"): edges contain a cycle or a shared child`
        );
      }
      visited.add(childId);
      const child: TreeNode = { id: childId, children: [] };
      node.children.push(child);
      stack.push({ node: child, depth: depth + 1 });
    }
  }

  return root;
}

/**
 * Collect the nodes of a tree in pre-order
 */
export function flattenTree(root: TreeNode): TreeNode[] {
  const result: TreeNode[] = [];
  const stack: TreeNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    result.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return result;
}
