/**
 * Error types raised by the layout engine and its input builders.
 */

/**
 * Base class for every error thrown by this package.
 */
export class TreeLayoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TreeLayoutError';
  }
}

/**
 * The input cannot be laid out: no root, a malformed document, or an invalid option.
 */
export class InvalidTreeError extends TreeLayoutError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTreeError';
  }
}

/**
 * The input is not a tree: some node is reachable more than once
 * (a cycle, or a subtree shared between two parents).
 */
export class TreeStructureError extends TreeLayoutError {
  /** Depth at which the repeated node was reached */
  readonly depth: number;

  constructor(depth: number, message?: string) {
    super(message ?? `Node reached twice at depth ${depth}: input contains a cycle or a shared subtree`);
    this.name = 'TreeStructureError';
    this.depth = depth;
  }
}
