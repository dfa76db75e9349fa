/**
 * Unit tests for JSON tree documents
 */

import { describe, it, expect } from 'vitest';
import { isAdjacencyDocument, parseTreeJson, validateTreeJson } from '../../src/transform/json-tree';
import { InvalidTreeError } from '../../src/errors';

describe('validateTreeJson', () => {
  it('should accept a nested document', () => {
    expect(validateTreeJson({ id: 'a', children: [{ id: 'b' }, { id: 'c', children: [] }] })).toEqual([]);
  });

  it('should accept an adjacency document', () => {
    expect(validateTreeJson({ root: 'a', edges: { a: ['b', 'c'] } })).toEqual([]);
  });

  it('should reject values that are not objects', () => {
    expect(validateTreeJson([])).toEqual(['Document must be a JSON object']);
    expect(validateTreeJson('tree')).toEqual(['Document must be a JSON object']);
  });

  it('should report problems with their path', () => {
    const errors = validateTreeJson({
      id: 'a',
      children: [{}, { id: 'a' }, { id: 'c', children: 5 }],
    });

    expect(errors).toEqual([
      'root.children[0]: Missing required field: id',
      'root.children[1]: Duplicate id "a"',
      'root.children[2]: Invalid field: children (must be an array)',
    ]);
  });

  it('should report invalid adjacency fields', () => {
    expect(validateTreeJson({ root: 1, edges: { a: 'b', c: ['d', 2] } })).toEqual([
      'Missing required field: root',
      'edges.a: must be an array of ids',
      'edges.c[1]: must be a non-empty string',
    ]);
  });

  it('should stop at a node that contains itself', () => {
    const node: { id: string; children: unknown[] } = { id: 'a', children: [] };
    node.children.push(node);

    expect(validateTreeJson(node)).toEqual([
      'root.children[0]: Node is reached twice: document contains a cycle or a shared subtree',
    ]);
  });

  it('should report a subtree shared by two parents once', () => {
    const shared = { id: 's' };

    expect(validateTreeJson({ id: 'r', children: [shared, shared] })).toEqual([
      'root.children[1]: Node is reached twice: document contains a cycle or a shared subtree',
    ]);
  });

  it('should not descend below a duplicate id', () => {
    const errors = validateTreeJson({
      id: 'a',
      children: [{ id: 'a', children: [{}] }],
    });

    expect(errors).toEqual(['root.children[0]: Duplicate id "a"']);
  });

  it('should report adjacency documents that are not trees', () => {
    expect(validateTreeJson({ root: 'a', edges: { a: ['b'], b: ['a'] } })).toEqual([
      'Node "a" is reached twice (from "b"): edges contain a cycle or a shared child',
    ]);
  });
});

describe('isAdjacencyDocument', () => {
  it('should narrow objects with a root field', () => {
    const value: unknown = { root: 'a', edges: {} };

    expect(isAdjacencyDocument(value)).toBe(true);
    if (isAdjacencyDocument(value)) {
      expect(value.root).toBe('a');
    }
  });

  it('should reject nested documents and non-objects', () => {
    expect(isAdjacencyDocument({ id: 'a' })).toBe(false);
    expect(isAdjacencyDocument(['root'])).toBe(false);
    expect(isAdjacencyDocument(null)).toBe(false);
  });
});

describe('parseTreeJson', () => {
  it('should parse a nested document', () => {
    expect(parseTreeJson({ id: 'a', children: [{ id: 'b' }] })).toEqual({
      id: 'a',
      children: [{ id: 'b', children: [] }],
    });
  });

  it('should parse an adjacency document', () => {
    expect(parseTreeJson({ root: 'a', edges: { a: ['b', 'c'] } })).toEqual({
      id: 'a',
      children: [
        { id: 'b', children: [] },
        { id: 'c', children: [] },
      ],
    });
  });

  it('should list every problem in the error', () => {
    expect(() => parseTreeJson({ id: 'a', children: [{}] })).toThrow(
      'Invalid tree document:\n  - root.children[0]: Missing required field: id'
    );
    expect(() => parseTreeJson(null)).toThrow(InvalidTreeError);
  });

  it('should reject a nested document with a cycle', () => {
    const parent: { id: string; children: unknown[] } = { id: 'p', children: [] };
    parent.children.push({ id: 'c', children: [parent] });

    expect(() => parseTreeJson(parent)).toThrow(
      'Invalid tree document:\n  - root.children[0].children[0]: Node is reached twice: document contains a cycle or a shared subtree'
    );
  });

  it('should reject an adjacency document with a cycle', () => {
    expect(() => parseTreeJson({ root: 'a', edges: { a: ['a'] } })).toThrow(InvalidTreeError);
  });
});
