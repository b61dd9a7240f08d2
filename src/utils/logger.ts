import pino from 'pino';
import pretty from 'pino-pretty';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Modules take it at load time with `getLogger()`; the CLI
 * reconfigures it once at startup via `initLogger()`, which swaps the level and
 * the output format in place so those early references stay live.
 * Logs go to stderr; stdout is reserved for command output.
 */
let loggerInstance: pino.Logger | null = null;
let sink: pino.DestinationStream = createSink(false);

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    sink = createSink(jsonLogs);
    const logger = getLogger();
    logger.level = level;
    return logger;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at SOTABOARD_LOG_LEVEL (or info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino(
            { level: envLogLevel() ?? 'info' },
            {
                write(message: string): void {
                    sink.write(message);
                },
            }
        );
    }
    return loggerInstance;
}

function createSink(jsonLogs: boolean): pino.DestinationStream {
    if (jsonLogs) return pino.destination({ dest: 2, sync: true });
    return pretty({
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        destination: 2,
        sync: true,
    });
}

function envLogLevel(): LogLevel | undefined {
    const value = process.env['SOTABOARD_LOG_LEVEL'];
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
        case 'silent':
            return value;
        default:
            return undefined;
    }
}
