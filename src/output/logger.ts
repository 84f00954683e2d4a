/**
 * Logger utility for ragprep
 *
 * Console output functions shared by the library and the CLI. Library code
 * reports progress through debug() and anomalies through warn(); the CLI turns
 * on silent mode for JSON output so stdout carries only the structured data.
 */

const PREFIX = '[ragprep]';

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log(), debug() and warn() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

export function isSilentMode(): boolean {
    return silentMode;
}

/**
 * Enable or disable debug output.
 */
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
 * Diagnostic output to stderr, only in verbose mode.
 */
export function debug(...args: unknown[]): void {
    if (verboseMode && !silentMode) {
        console.error(PREFIX, ...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(`${PREFIX} Warning:`, ...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}
