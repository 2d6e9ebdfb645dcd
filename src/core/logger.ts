/**
 * Diagnostic sink used by the client for conditions it recovers from.
 * @module core/logger
 */

export type AmiLogger = {
    debug(message: string, details?: Record<string, unknown>): void;
    warn(message: string, details?: Record<string, unknown>): void;
};

const write = (method: 'debug' | 'warn', message: string, details?: Record<string, unknown>): void => {
    if (details) {
        console[method](message, details);
    } else {
        console[method](message);
    }
};

/** Warnings go to `console.warn`; debug output is dropped. */
export const consoleLogger: AmiLogger = {
    debug: () => undefined,
    warn: (message, details) => write('warn', message, details),
};

/** Sends both levels to the console. */
export const verboseConsoleLogger: AmiLogger = {
    debug: (message, details) => write('debug', message, details),
    warn: (message, details) => write('warn', message, details),
};
