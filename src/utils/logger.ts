/**
 * Centralized Logging System for pod2thread
 *
 * Provides structured logging with:
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - A single line sink, standard error by default
 * - Stack traces for errors at debug level
 * - Module-scoped loggers
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/**
 * Map string config values to LogLevel
 */
const LOG_LEVEL_MAP: Record<string, LogLevel> = {
    'debug': LogLevel.DEBUG,
    'info': LogLevel.INFO,
    'warn': LogLevel.WARN,
    'warning': LogLevel.WARN,
    'error': LogLevel.ERROR
};

/** Environment variable consulted for the initial log level */
export const LOG_LEVEL_ENV = 'POD2THREAD_LOG_LEVEL';

/**
 * Destination for formatted log lines
 */
export type LogSink = (line: string) => void;

/**
 * Options accepted by {@link configureLogging}
 */
export interface LoggingOptions {
    level?: LogLevel | string;
    sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
    process.stderr.write(line + '\n');
};

/**
 * Parse a level name ("debug", "info", "warn", "error")
 * @returns The level, or undefined for an unknown name
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (!value) return undefined;
    return LOG_LEVEL_MAP[value.trim().toLowerCase()];
}

/**
 * Global logging state
 */
export class LoggingService {
    private sink: LogSink = stderrSink;
    private configuredLevel: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? LogLevel.INFO;

    /**
     * Apply a level and/or sink. Unknown level names leave the level unchanged.
     */
    configure(options: LoggingOptions): void {
        if (options.level !== undefined) {
            const level = typeof options.level === 'string'
                ? parseLogLevel(options.level)
                : options.level;
            if (level !== undefined) {
                this.configuredLevel = level;
            }
        }
        if (options.sink) {
            this.sink = options.sink;
        }
    }

    /**
     * Restore the standard error sink and the level from the environment
     */
    reset(): void {
        this.sink = stderrSink;
        this.configuredLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? LogLevel.INFO;
    }

    /**
     * Check if a log level should be output
     */
    shouldLog(level: LogLevel): boolean {
        // Errors are always logged regardless of configured level
        if (level === LogLevel.ERROR) {
            return true;
        }
        return level >= this.configuredLevel;
    }

    /**
     * Format a log message
     */
    private formatMessage(level: LogLevel, module: string, message: string, data?: object): string {
        const timestamp = new Date().toISOString();
        const levelStr = LogLevel[level].padEnd(5);
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        return `[${timestamp}] [${levelStr}] [${module}] ${message}${dataStr}`;
    }

    /**
     * Log a message
     */
    log(level: LogLevel, module: string, message: string, data?: object): void {
        if (!this.shouldLog(level)) {
            return;
        }
        this.sink(this.formatMessage(level, module, message, data));
    }

    /**
     * Log an error, with its stack when debugging
     */
    logError(module: string, message: string, error?: Error, data?: object): void {
        this.log(LogLevel.ERROR, module, message, data);

        if (error?.stack && this.configuredLevel === LogLevel.DEBUG) {
            this.sink(`  Stack: ${error.stack}`);
        }
    }
}

// Global singleton instance
const loggingService = new LoggingService();

/**
 * Configure the logging service - the CLI calls this once after reading settings
 */
export function configureLogging(options: LoggingOptions): void {
    loggingService.configure(options);
}

/**
 * Restore default logging (used by tests)
 */
export function resetLogging(): void {
    loggingService.reset();
}

/**
 * Module-scoped logger for convenient logging
 */
export class Logger {
    constructor(private module: string) {}

    /**
     * Log a debug message (only when log level is DEBUG)
     */
    debug(message: string, data?: object): void {
        loggingService.log(LogLevel.DEBUG, this.module, message, data);
    }

    /**
     * Log an info message
     */
    info(message: string, data?: object): void {
        loggingService.log(LogLevel.INFO, this.module, message, data);
    }

    /**
     * Log a warning message
     */
    warn(message: string, data?: object): void {
        loggingService.log(LogLevel.WARN, this.module, message, data);
    }

    /**
     * Log an error message with optional Error object.
     * Errors are logged at every level.
     */
    error(message: string, error?: Error, data?: object): void {
        loggingService.logError(this.module, message, error, data);
    }
}

/**
 * Create a logger for a module
 */
export function createLogger(module: string): Logger {
    return new Logger(module);
}

// Pre-created loggers for common modules
export const parserLogger = createLogger('Parser');
export const exportLogger = createLogger('Export');
export const cliLogger = createLogger('CLI');
