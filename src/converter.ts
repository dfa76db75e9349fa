/**
 * TidyTreeLayout - JSON Converter
 *
 * Converts a JSON tree document to a list of laid out nodes with drawing
 * coordinates.
 */

import { TreeLayoutError } from './errors';
import type { Bounds, TreeLayoutOptions, TreeNode } from './types';
import { TreeLayouter } from './layout';
import { flattenTree, parseTreeJson } from './transform';

/**
 * A node of the converter output
 */
export interface LayoutedNode {
  id: string;
  x: number;
  y: number;
}

/**
 * Converter output: nodes in pre-order, plus the bounds of the drawing
 */
export interface LayoutedTree {
  nodes: LayoutedNode[];
  bounds: Bounds;
}

export class TidyTreeLayout {
  private layouter: TreeLayouter;

  constructor(options?: Partial<TreeLayoutOptions>) {
    this.layouter = new TreeLayouter(options);
  }

  /**
   * Convert a tree document to layouted JSON with coordinates
   *
   * @param input - parsed JSON, nested or adjacency form
   * @returns every node with its x, y coordinates
   *
   * @example
   * ```typescript
   * const converter = new TidyTreeLayout({ horizontalGap: 40, verticalGap: 60 });
   * const layouted = converter.to_json({ id: 'a', children: [{ id: 'b' }, { id: 'c' }] });
   * console.log(layouted.nodes[0]); // { id: 'a', x: 40, y: 0 }
   * ```
   */
  to_json(input: unknown): LayoutedTree {
    const tree = parseTreeJson(input);
    const positions = this.layouter.layout<TreeNode>(tree);

    const nodes = flattenTree(tree).map((node) => {
      const point = positions.get(node);
      if (!point) {
        throw new TreeLayoutError(`Node "${node.id}" has no position`);
      }
      return { id: node.id, x: point.x, y: point.y };
    });

    return {
      nodes,
      bounds: this.layouter.getTreeBounds(positions),
    };
  }
}
