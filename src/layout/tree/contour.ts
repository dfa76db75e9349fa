/**
 * Contour Walker
 * Steps down the left or right silhouette of a subtree, level by level,
 * following the extreme child or, where the subtree ends, its thread.
 */

import type { LayoutNode } from './layout-node';

export type ContourSide = 'left' | 'right';

/**
 * Next node on the given contour of `node`, one level deeper.
 * Returns null at the natural edge of the tree.
 */
export function nextOnContour<T>(node: LayoutNode<T>, side: ContourSide): LayoutNode<T> | null {
  const child = side === 'left' ? node.firstChild : node.lastChild;
  return child ?? node.thread;
}

/**
 * Shared counter for the steps taken by every cursor of one layout run
 */
export interface StepCounter {
  contourSteps: number;
}

/**
 * Position on a contour, together with the modifiers crossed to reach it.
 *
 * `modSum` is the sum of the `mod` of every node stepped through, not counting
 * the current node, so `position` is the node's x in the frame where the walk
 * started.
 */
export class ContourCursor<T> {
  node: LayoutNode<T>;
  modSum = 0;
  private readonly side: ContourSide;
  private readonly counter: StepCounter;

  constructor(start: LayoutNode<T>, side: ContourSide, counter: StepCounter) {
    this.node = start;
    this.side = side;
    this.counter = counter;
  }

  get position(): number {
    return this.node.x + this.modSum;
  }

  /**
   * Sum of modifiers that applies to the node one level below
   */
  get childModSum(): number {
    return this.modSum + this.node.mod;
  }

  peek(): LayoutNode<T> | null {
    return nextOnContour(this.node, this.side);
  }

  /**
   * Move one level down. Returns false, without moving, at the end of the contour.
   */
  advance(): boolean {
    const next = this.peek();
    if (!next) return false;
    this.modSum += this.node.mod;
    this.node = next;
    this.counter.contourSteps++;
    return true;
  }
}
