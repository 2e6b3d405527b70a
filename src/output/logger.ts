/**
 * Console logging for memoforge.
 *
 * Silent mode suppresses progress output so that commands printing JSON
 * (`checkpoint --json`, `fact-check --json`) write only their payload to
 * stdout. Verbose mode enables debug() lines.
 */

let silentMode = false;
let verboseMode = false;

export function setSilentMode(silent: boolean): void {
  silentMode = silent;
}

export function setVerboseMode(verbose: boolean): void {
  verboseMode = verbose;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
  if (!silentMode) {
    console.log(...args);
  }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
  if (!silentMode) {
    console.warn(...args);
  }
}

/**
 * Debug detail, printed only in verbose mode.
 */
export function debug(...args: unknown[]): void {
  if (verboseMode && !silentMode) {
    console.log(...args);
  }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
  console.error(...args);
}
