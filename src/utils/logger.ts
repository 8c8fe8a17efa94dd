import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 * Output goes to stderr: stdout is reserved for pipeline results.
 */
let loggerInstance: pino.Logger | null = null;

const STDERR = 2;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level }, pino.destination(STDERR));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: STDERR,
                },
            },
        });
    }

    return loggerInstance;
}

function isLogLevel(value: string | undefined): value is LogLevel {
    return value === 'error' || value === 'warn' || value === 'info' || value === 'debug' || value === 'silent';
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at `LOG_LEVEL` (info when unset).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        const envLevel = process.env['LOG_LEVEL'];
        loggerInstance = initLogger({ level: isLogLevel(envLevel) ? envLevel : 'info' });
    }
    return loggerInstance;
}
