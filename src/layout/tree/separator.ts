/**
 * Subtree Separator
 * Pushes a freshly placed sibling subtree right until it clears the forest of
 * its left siblings, then threads the shorter contour into the taller one.
 */

import { TreeLayoutError } from '../../errors';
import type { LayoutStats } from '../../types';
import { ContourCursor } from './contour';
import type { LayoutNode } from './layout-node';

export interface SeparationContext {
  /** Minimum distance between neighbouring nodes on one level */
  separation: number;
  stats: LayoutStats;
}

/**
 * Separate `v` from the siblings on its left.
 *
 * Walks the right contour of the left forest against the left contour of `v`
 * (plus the two outer contours, which receive the threads), moving `v` right
 * whenever a level is too close. Moves are O(1): only `x` and `mod` of `v`
 * change, and intermediate siblings get their share later through
 * `change`/`shift`.
 *
 * When `v` is the last child, it moves one extra unit if the parent's midpoint
 * would otherwise fall between two grid positions.
 *
 * @returns the default ancestor to use for the next sibling
 */
export function separateSubtree<T>(
  v: LayoutNode<T>,
  leftSibling: LayoutNode<T>,
  defaultAncestor: LayoutNode<T>,
  context: SeparationContext
): LayoutNode<T> {
  const parent = v.parent;
  const first = parent?.firstChild;
  if (!parent || !first) {
    throw new TreeLayoutError('Cannot separate a subtree that has no parent');
  }

  const { separation, stats } = context;
  const innerLeft = new ContourCursor(leftSibling, 'right', stats);
  const outerLeft = new ContourCursor(first, 'left', stats);
  const innerRight = new ContourCursor(v, 'left', stats);
  const outerRight = new ContourCursor(v, 'right', stats);
  let levels = 0;

  while (innerLeft.peek() && innerRight.peek()) {
    innerLeft.advance();
    innerRight.advance();
    if (!outerLeft.advance() || !outerRight.advance()) {
      throw new TreeLayoutError(`Contours out of step at depth ${innerRight.node.y}`);
    }
    levels++;
    outerRight.node.ancestor = v;

    const shift = separation - (innerRight.position - innerLeft.position);
    if (shift > 0) {
      moveSubtree(conflictAncestor(innerLeft.node, v, defaultAncestor), v, shift);
      innerRight.modSum += shift;
      outerRight.modSum += shift;
      stats.conflictShifts++;
    }
  }

  if (v === parent.lastChild && (first.x + v.x) % 2 !== 0) {
    v.x += 1;
    v.mod += 1;
    // Cursors below v already counted its old mod
    if (levels > 0) {
      innerRight.modSum += 1;
      outerRight.modSum += 1;
    }
  }

  const leftNext = innerLeft.peek();
  const rightNext = innerRight.peek();

  // Left forest is deeper: continue v's right contour into it
  if (leftNext && !outerRight.peek()) {
    outerRight.node.thread = leftNext;
    outerRight.node.mod += innerLeft.childModSum - outerRight.childModSum;
    stats.threads++;
  }

  // v is deeper: continue the forest's left contour into v
  if (rightNext && !outerLeft.peek()) {
    outerLeft.node.thread = rightNext;
    outerLeft.node.mod += innerRight.childModSum - outerLeft.childModSum;
    stats.threads++;
    return v;
  }

  return defaultAncestor;
}

/**
 * The left sibling a conflict with contour node `leftNode` is attributed to
 */
function conflictAncestor<T>(
  leftNode: LayoutNode<T>,
  v: LayoutNode<T>,
  defaultAncestor: LayoutNode<T>
): LayoutNode<T> {
  return leftNode.ancestor.parent === v.parent ? leftNode.ancestor : defaultAncestor;
}

/**
 * Move the subtree of `wr` right by `shift` and record the even share owed to
 * every sibling strictly between `wl` and `wr`.
 *
 * Shares are whole units: each intermediate step gets `shift / subtrees`
 * rounded to the nearest integer, capped so that the sibling next to `wr`
 * never moves further than `wr` itself.
 */
export function moveSubtree<T>(wl: LayoutNode<T>, wr: LayoutNode<T>, shift: number): void {
  const subtrees = wr.index - wl.index;
  if (subtrees <= 0) {
    throw new TreeLayoutError(`Cannot move subtree ${wr.index} against sibling ${wl.index}`);
  }

  const share = subtrees === 1
    ? shift
    : Math.min(Math.round(shift / subtrees), Math.floor(shift / (subtrees - 1)));
  wr.change -= share;
  wr.shift += share * subtrees;
  wl.change += share;
  wr.x += shift;
  wr.mod += shift;
}

/**
 * Apply the pending shares recorded by {@link moveSubtree} to the children of
 * `node`, in a single right-to-left sweep.
 */
export function executeShifts<T>(node: LayoutNode<T>): void {
  let shift = 0;
  let change = 0;
  for (let i = node.children.length - 1; i >= 0; i--) {
    const child = node.children[i];
    child.x += shift;
    child.mod += shift;
    change += child.change;
    shift += child.shift + change;
  }
}
