/**
 * Logger utility for claimtrace
 *
 * Console output that can be silenced with `--quiet`, leaving only errors
 * on stderr.
 */

export const LOG_PREFIX = '[claimtrace]';

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log(), warn() and debug() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

export function isSilentMode(): boolean {
    return silentMode;
}

export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

export function isVerboseMode(): boolean {
    return verboseMode;
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
 * Diagnostics to stderr, only with --verbose.
 */
export function debug(...args: unknown[]): void {
    if (verboseMode && !silentMode) {
        console.error(LOG_PREFIX, ...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}
