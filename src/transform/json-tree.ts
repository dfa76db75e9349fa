/**
 * JSON Tree Documents
 *
 * Two document shapes are accepted:
 * - nested: `{ "id": "a", "children": [{ "id": "b" }] }`
 * - adjacency: `{ "root": "a", "edges": { "a": ["b", "c"] } }`
 */

import { InvalidTreeError, TreeLayoutError } from '../errors';
import type { TreeNode } from '../types';
import { buildTree } from './tree-builder';

export interface NestedTreeDocument {
  id: string;
  children?: NestedTreeDocument[];
}

export interface AdjacencyTreeDocument {
  root: string;
  edges: Record<string, string[]>;
}

export type TreeDocument = NestedTreeDocument | AdjacencyTreeDocument;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAdjacencyDocument(value: unknown): value is Record<string, unknown> & { root: unknown } {
  return isRecord(value) && 'root' in value;
}

/**
 * Validate a parsed JSON value as a tree document.
 * @returns one message per problem found; empty when the document is valid
 */
export function validateTreeJson(value: unknown): string[] {
  if (isAdjacencyDocument(value)) {
    return validateAdjacency(value);
  }
  return isRecord(value) ? validateNested(value) : ['Document must be a JSON object'];
}

/**
 * Parse a JSON value into a tree
 * @throws InvalidTreeError listing every validation problem
 * @throws TreeStructureError when an adjacency document is not a tree
 */
export function parseTreeJson(value: unknown): TreeNode {
  const errors = validateTreeJson(value);
  if (errors.length > 0) {
    throw new InvalidTreeError(`Invalid tree document:\n  - ${errors.join('\n  - ')}`);
  }
  if (isAdjacencyDocument(value)) {
    return parseAdjacency(value);
  }
  if (!isRecord(value)) {
    throw new InvalidTreeError('Document must be a JSON object');
  }
  return parseNested(value);
}

function validateNested(value: Record<string, unknown>): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();
  const visited = new Set<object>();
  const stack: Array<{ node: unknown; path: string }> = [{ node: value, path: 'root' }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, path } = frame;

    if (!isRecord(node)) {
      errors.push(`${path}: must be an object`);
      continue;
    }
    if (visited.has(node)) {
      errors.push(`${path}: Node is reached twice: document contains a cycle or a shared subtree`);
      continue;
    }
    visited.add(node);

    const id = node['id'];
    if (typeof id !== 'string' || id.length === 0) {
      errors.push(`${path}: Missing required field: id`);
    } else if (seen.has(id)) {
      errors.push(`${path}: Duplicate id "${id}"`);
      continue;
    } else {
      seen.add(id);
    }

    const children = node['children'];
    if (children === undefined) continue;
    if (!Array.isArray(children)) {
      errors.push(`${path}: Invalid field: children (must be an array)`);
      continue;
    }
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], path: `${path}.children[${i}]` });
    }
  }

  return errors;
}

function validateAdjacency(value: Record<string, unknown>): string[] {
  const errors: string[] = [];
  const root = value['root'];
  const edges = value['edges'];

  if (typeof root !== 'string' || root.length === 0) {
    errors.push('Missing required field: root');
  }
  if (!isRecord(edges)) {
    errors.push('Missing or invalid field: edges (must be an object)');
    return errors;
  }

  for (const [parentId, childIds] of Object.entries(edges)) {
    if (!Array.isArray(childIds)) {
      errors.push(`edges.${parentId}: must be an array of ids`);
      continue;
    }
    childIds.forEach((childId: unknown, i: number) => {
      if (typeof childId !== 'string' || childId.length === 0) {
        errors.push(`edges.${parentId}[${i}]: must be a non-empty string`);
      }
    });
  }

  if (errors.length === 0 && typeof root === 'string') {
    try {
      buildTree(root, toEdgeMap(edges));
    } catch (error) {
      if (!(error instanceof TreeLayoutError)) throw error;
      errors.push(error.message);
    }
  }

  return errors;
}

function parseNested(value: Record<string, unknown>): TreeNode {
  const toNode = (source: Record<string, unknown>): TreeNode => ({
    id: String(source['id']),
    children: [],
  });

  const root = toNode(value);
  const stack: Array<{ source: Record<string, unknown>; node: TreeNode }> = [{ source: value, node: root }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const children = frame.source['children'];
    if (!Array.isArray(children)) continue;

    for (const child of children) {
      if (!isRecord(child)) continue;
      const node = toNode(child);
      frame.node.children.push(node);
      stack.push({ source: child, node });
    }
  }

  return root;
}

function parseAdjacency(value: Record<string, unknown>): TreeNode {
  const root = value['root'];
  const edges = value['edges'];
  if (typeof root !== 'string' || !isRecord(edges)) {
    throw new InvalidTreeError('Adjacency document needs a root id and an edges object');
  }
  return buildTree(root, toEdgeMap(edges));
}

function toEdgeMap(edges: Record<string, unknown>): Map<string, string[]> {
  const edgeMap = new Map<string, string[]>();
  for (const [parentId, childIds] of Object.entries(edges)) {
    if (Array.isArray(childIds)) {
      edgeMap.set(parentId, childIds.map(String));
    }
  }
  return edgeMap;
}
