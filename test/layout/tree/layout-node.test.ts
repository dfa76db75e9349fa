/**
 * Unit tests for the layout node model
 */

import { describe, it, expect } from 'vitest';
import { LayoutNode, buildLayoutTree } from '../../../src/layout/tree/layout-node';
import { childrenOf } from '../../../src/layout/tree/tree-layout';
import { TreeStructureError } from '../../../src/errors';
import type { TreeNode } from '../../../src/types';
import { node } from '../../helpers/trees';

describe('LayoutNode', () => {
  it('should start with default layout fields', () => {
    const layoutNode = new LayoutNode('a', null, 0);

    expect(layoutNode.x).toBe(0);
    expect(layoutNode.y).toBe(0);
    expect(layoutNode.mod).toBe(0);
    expect(layoutNode.thread).toBeNull();
    expect(layoutNode.ancestor).toBe(layoutNode);
    expect(layoutNode.isLeaf).toBe(true);
    expect(layoutNode.leftSibling).toBeUndefined();
  });

  it('should take its depth from the parent', () => {
    const parent = new LayoutNode('p', null, 0);
    const child = new LayoutNode('c', parent, 0);

    expect(child.y).toBe(1);
  });
});

describe('buildLayoutTree', () => {
  it('should mirror the input tree in pre-order', () => {
    const root = node('root', node('a', node('a1'), node('a2')), node('b'));

    const tree = buildLayoutTree<TreeNode>(root, childrenOf);

    expect(tree.nodes.map((n) => n.source.id)).toEqual(['root', 'a', 'a1', 'a2', 'b']);
    expect(tree.nodes.map((n) => n.y)).toEqual([0, 1, 2, 2, 1]);
    expect(tree.depth).toBe(2);
    expect(tree.root.children.map((c) => c.index)).toEqual([0, 1]);
  });

  it('should link parents and siblings', () => {
    const root = node('root', node('a'), node('b'));

    const tree = buildLayoutTree<TreeNode>(root, childrenOf);
    const [a, b] = tree.root.children;

    expect(a.parent).toBe(tree.root);
    expect(b.leftSibling).toBe(a);
    expect(tree.root.firstChild).toBe(a);
    expect(tree.root.lastChild).toBe(b);
  });

  it('should throw on a node reached twice', () => {
    const loop = node('loop');
    loop.children.push(loop);

    expect(() => buildLayoutTree<TreeNode>(loop, childrenOf)).toThrow(TreeStructureError);
  });
});
