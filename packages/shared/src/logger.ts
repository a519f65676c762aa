/**
 * @file logger.ts
 * @description A simple, centralized, level-based logger for the dataref bridge packages.
 * @module DataRefBridge/Shared
 */

/**
 * Defines the available logging levels.
 * The levels are ordered by verbosity, from least to most verbose.
 */
export enum LogLevel {
    ERROR = 0,
    WARN = 1,
    INFO = 2,
    DEBUG = 3,
    TRACE = 4,
}

/** Level names accepted by configuration, in the order of {@link LogLevel}. */
export const LOG_LEVEL_NAMES = ['ERROR', 'WARN', 'INFO', 'DEBUG', 'TRACE'] as const;

export type LogLevelName = typeof LOG_LEVEL_NAMES[number];

/**
 * Converts a configured level name into its {@link LogLevel}.
 */
export function parseLogLevel(name: LogLevelName): LogLevel {
    return LogLevel[name];
}

/**
 * Defines the contract for a logger output sink.
 * This allows each entry point (CLI, mock responder, tests) to route log lines its own way.
 */
export interface ILoggerOutput {
    log(level: LogLevel, message: string): void;
}

/**
 * A default console logger output that writes to the standard console.
 */
export class ConsoleLoggerOutput implements ILoggerOutput {
    public log(level: LogLevel, message: string): void {
        switch (level) {
            case LogLevel.ERROR:
                console.error(message);
                break;
            case LogLevel.WARN:
                console.warn(message);
                break;
            case LogLevel.INFO:
                console.info(message);
                break;
            default: // DEBUG and TRACE
                console.log(message);
                break;
        }
    }
}

/**
 * A simple, centralized, level-based logger.
 */
export class Logger {
    private static _level: LogLevel = LogLevel.INFO;
    private static _output: ILoggerOutput = new ConsoleLoggerOutput();

    private readonly componentName: string;

    /**
     * Creates a new logger instance for a specific component.
     * @param componentName The name of the component, which will be included in log messages.
     */
    constructor(componentName: string) {
        this.componentName = componentName;
    }

    /**
     * Sets the global minimum log level.
     * Messages with a level lower than this will not be logged.
     * @param level The minimum log level to display.
     */
    public static setLevel(level: LogLevel): void {
        Logger._level = level;
    }

    /** Returns the global minimum log level. */
    public static getLevel(): LogLevel {
        return Logger._level;
    }

    /**
     * Sets the global output sink for all loggers.
     * @param output An object that implements the ILoggerOutput interface.
     */
    public static setOutput(output: ILoggerOutput): void {
        Logger._output = output;
    }

    /**
     * Formats the log message with a timestamp, level, and component name.
     * @returns The formatted log string.
     */
    private format(level: LogLevel, message: string, args: unknown[]): string {
        const timestamp = new Date().toISOString();
        const levelStr = LogLevel[level].padEnd(5, ' ');
        let formattedMessage = `[${timestamp}] [${levelStr}] [${this.componentName}] ${message}`;

        if (args.length > 0) {
            const formattedArgs = args.map(arg => {
                if (arg instanceof Error) {
                    return `${arg.name}: ${arg.message}`;
                }
                if (typeof arg === 'object' && arg !== null) {
                    try {
                        return JSON.stringify(arg, this.getCircularReplacer());
                    } catch {
                        return '[Unserializable Object]';
                    }
                }
                return String(arg);
            }).join(' ');
            formattedMessage += ` | ${formattedArgs}`;
        }

        return formattedMessage;
    }

    /**
     * Creates a replacer function for JSON.stringify to handle circular references.
     */
    private getCircularReplacer = () => {
        const seen = new WeakSet<object>();
        return (_key: string, value: unknown): unknown => {
            if (typeof value === 'object' && value !== null) {
                if (seen.has(value)) {
                    return '[Circular Reference]';
                }
                seen.add(value);
            }
            return value;
        };
    };

    private log(level: LogLevel, message: string, args: unknown[]): void {
        if (level <= Logger._level) {
            Logger._output.log(level, this.format(level, message, args));
        }
    }

    /** Logs a TRACE level message. For raw datagrams and other verbose detail. */
    public trace(message: string, ...args: unknown[]): void {
        this.log(LogLevel.TRACE, message, args);
    }

    /** Logs a DEBUG level message. For development-time debugging. */
    public debug(message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, message, args);
    }

    /** Logs an INFO level message. For major lifecycle events and operations. */
    public info(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, message, args);
    }

    /** Logs a WARN level message. For non-critical issues or potential problems. */
    public warn(message: string, ...args: unknown[]): void {
        this.log(LogLevel.WARN, message, args);
    }

    /** Logs an ERROR level message. For exceptions and critical failures. */
    public error(message: string, ...args: unknown[]): void {
        this.log(LogLevel.ERROR, message, args);
    }
}
