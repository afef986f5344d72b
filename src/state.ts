/**
 * @file state.ts
 * @description Process-wide debugging flag and the verbose logging helpers
 * built on it. Solver state itself lives on each system instance.
 */

// Debugging Utilities
let _debug_verbose_flag = false;

export function setDebugVerbose(value: boolean): void {
    _debug_verbose_flag = value;
}

export function getDebugVerbose(): boolean {
    return _debug_verbose_flag;
}

export function consoleLog(message?: unknown, ...optionalParams: unknown[]): void {
    if (_debug_verbose_flag) {
        console.log("[VERBOSE]", message, ...optionalParams);
    }
}

export type VerboseLogger = (message?: unknown, ...optionalParams: unknown[]) => void;

/**
 * Returns a logger that prints when either the given per-system flag or the
 * global debug flag is set.
 */
export function verboseLogger(enabled: boolean): VerboseLogger {
    if (!enabled) return consoleLog;
    return (message, ...optionalParams) => console.log("[VERBOSE]", message, ...optionalParams);
}

export function warn(message: string): void {
    console.warn(`Warning: ${message}`);
}
