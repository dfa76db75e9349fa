/**
 * Tree Layouter
 * Maps the unit-grid tree layout onto drawing coordinates.
 */

import { InvalidTreeError } from '../../errors';
import type { Bounds, ChildAccessor, HasChildren, Point, TreeLayoutOptions } from '../../types';
import { DEFAULT_TREE_LAYOUT_OPTIONS } from '../default-options';
import { childrenOf, layoutTree } from './tree-layout';

/**
 * Lays out trees and scales the result to drawing coordinates
 */
export class TreeLayouter {
  private options: TreeLayoutOptions;

  constructor(options?: Partial<TreeLayoutOptions>) {
    this.options = { ...DEFAULT_TREE_LAYOUT_OPTIONS, ...options };

    const { horizontalGap, verticalGap } = this.options;
    if (!Number.isFinite(horizontalGap) || horizontalGap <= 0) {
      throw new InvalidTreeError(`horizontalGap must be a positive number, got ${horizontalGap}`);
    }
    if (!Number.isFinite(verticalGap) || verticalGap <= 0) {
      throw new InvalidTreeError(`verticalGap must be a positive number, got ${verticalGap}`);
    }
  }

  /**
   * Layout a tree structure.
   * The leftmost node (topmost when growing RIGHT) lands on 0, the root on
   * the other axis at 0.
   */
  layout<T extends HasChildren<T>>(root: T): Map<T, Point>;
  layout<T>(root: T, getChildren: ChildAccessor<T>): Map<T, Point>;
  layout<T>(root: T, getChildren: ChildAccessor<T> = childrenOf): Map<T, Point> {
    const { horizontalGap, verticalGap, direction, separation } = this.options;
    const grid = layoutTree(root, { getChildren, separation });

    let minX = Infinity;
    for (const node of grid.nodes) {
      minX = Math.min(minX, node.x);
    }

    const result = new Map<T, Point>();
    for (const node of grid.nodes) {
      const across = node.x - minX;
      if (direction === 'DOWN') {
        result.set(node.source, { x: across * horizontalGap, y: node.y * verticalGap });
      } else {
        result.set(node.source, { x: node.y * horizontalGap, y: across * verticalGap });
      }
    }
    return result;
  }

  /**
   * Apply offset to every position
   */
  applyOffset<T>(positions: Map<T, Point>, offsetX: number, offsetY: number): void {
    for (const point of positions.values()) {
      point.x += offsetX;
      point.y += offsetY;
    }
  }

  /**
   * Get bounds of the laid out tree
   */
  getTreeBounds<T>(positions: Map<T, Point>): Bounds {
    if (positions.size === 0) {
      return { x: 0, y: 0, width: 0, height: 0 };
    }

    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;

    for (const { x, y } of positions.values()) {
      minX = Math.min(minX, x);
      minY = Math.min(minY, y);
      maxX = Math.max(maxX, x);
      maxY = Math.max(maxY, y);
    }

    return {
      x: minX,
      y: minY,
      width: maxX - minX,
      height: maxY - minY,
    };
  }
}
