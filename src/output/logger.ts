/**
 * Console output for factledger.
 *
 * Machine-readable output (`--output json`) writes ONLY result records to
 * stdout, so informational logs and warnings can be silenced. Errors always
 * reach stderr.
 */

const PREFIX = '[factledger]';

let silentMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log() and warn() output nothing.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

export function isSilentMode(): boolean {
    return silentMode;
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
 * Log warning to stderr with the tool prefix. Silenced in silent mode.
 */
export function warn(message: string): void {
    if (!silentMode) {
        console.warn(`${PREFIX} Warning: ${message}`);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}

/**
 * Verbose diagnostics, prefixed; only printed when the caller enabled them.
 */
export function debug(enabled: boolean | undefined, message: string): void {
    if (enabled && !silentMode) {
        console.log(`${PREFIX} ${message}`);
    }
}
