/**
 * @file logger.ts
 * @module shared/logger
 * @license MIT
 *
 * @fileoverview Leveled console logging tagged with the emitting module.
 */

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3,
};

let minLevel: LogLevel = 'info';

/**
 * Set the lowest level that gets printed. Defaults to `info`.
 */
export function setLogLevel(level: LogLevel): void {
    minLevel = level;
}

/**
 * Console logger for one module.
 *
 * Every line has the form `<level>: [<module>] <message>`.
 * Warnings and errors go to stderr.
 *
 * @example
 * ```typescript
 * const log = new Logger('doxygen-parser');
 * log.warning('Unknown tag = sp');
 * // warning: [doxygen-parser] Unknown tag = sp
 * ```
 */
export class Logger {
    private module: string;

    constructor(module: string) {
        this.module = module;
    }

    debug(message: string): void {
        if (this.enabled('debug')) {
            console.debug(this.format('debug', message));
        }
    }

    info(message: string): void {
        if (this.enabled('info')) {
            console.info(this.format('info', message));
        }
    }

    warning(message: string): void {
        if (this.enabled('warning')) {
            console.warn(this.format('warning', message));
        }
    }

    error(message: string): void {
        console.error(this.format('error', message));
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
    }

    private format(level: LogLevel, message: string): string {
        return `${level}: [${this.module}] ${message}`;
    }
}
