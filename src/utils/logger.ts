import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Structured pino logging, pretty-printed unless `jsonLogs` is set.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger. Called once by the CLI before any command runs.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance, creating a default one on first use.
 * Outside the CLI (library use, tests) that default logs JSON at `warn`.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino({ level: process.env['SCHOLARSTATS_LOG_LEVEL'] ?? 'warn' });
    }
    return loggerInstance;
}
