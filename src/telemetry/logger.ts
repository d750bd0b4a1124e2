// src/telemetry/logger.ts

export type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

let debugEnabled = process.env.LIBRARY_DEBUG === '1';

/**
 * Toggle debug output at runtime (the console entry point wires this to config)
 */
export function setDebugLogging(enabled: boolean): void {
    debugEnabled = enabled;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
    if (level === 'debug' && !debugEnabled) {
        return;
    }

    // stdout belongs to menus and tables; every log line goes to stderr
    const logger = level === 'warn' ? console.warn : console.error;
    const line = `[${level.toUpperCase()}] ${message}`;
    if (context && Object.keys(context).length > 0) {
        logger(line, context);
        return;
    }
    logger(line);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
