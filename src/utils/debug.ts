/**
 * Debug Logging
 * Opt-in diagnostics for the layout passes, switched on with DEBUG=true.
 */

// Set by the CLI entry point so that stdout stays valid JSON
let cliMode = false;

/**
 * Silence debug output for the rest of the process.
 * Call before anything that logs is loaded.
 */
export function enableCliMode(): void {
  cliMode = true;
}

/**
 * True when DEBUG=true is set and the process is not the CLI.
 *
 * @example
 * ```bash
 * DEBUG=true npx vitest run -t "deep chain"
 * ```
 */
export function isDebugEnabled(): boolean {
  if (cliMode) return false;

  try {
    return typeof process !== 'undefined' && process.env['DEBUG'] === 'true';
  } catch {
    // process is not reachable outside Node
    return false;
  }
}

export function debugLog(scope: string, message: string): void {
  if (isDebugEnabled()) {
    console.log(`[${scope}] ${message}`);
  }
}
