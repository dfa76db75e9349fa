#!/usr/bin/env node
/**
 * CLI Binary Entry Point
 *
 * Enable CLI mode first to suppress debug logging before any other imports.
 * Uses dynamic import to ensure the order of execution.
 */

import { enableCliMode } from '../utils/debug';

// Must run before the CLI module (and the layout engine) is loaded
enableCliMode();

import('../cli')
  .then(({ run }) => run(process.argv))
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
