/**
 * Console logging for pyreview.
 *
 * Diagnostics carry a `[pyreview]` prefix. Findings never go through here;
 * reporters write them.
 */

const PREFIX = '[pyreview]';

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log() and warn() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

/**
 * Enable or disable verbose mode, which lets debug() through.
 */
export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(PREFIX, ...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(PREFIX, ...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(PREFIX, ...args);
}

/**
 * Verbose-only output to stderr.
 */
export function debug(...args: unknown[]): void {
    if (verboseMode && !silentMode) {
        console.error(PREFIX, ...args);
    }
}
