import { LogLevel } from './types.js';
import { sanitizeMessage } from './errors.js';

interface LogContext {
    [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

type LogSink = (line: string) => void;

/**
 * Line logger for a stdio MCP server: stdout belongs to the protocol, so
 * every line is written to stderr.
 */
export class Logger {
    private level: LogLevel;
    private readonly sink: LogSink;

    constructor(level: LogLevel = 'info', sink: LogSink = line => process.stderr.write(`${line}\n`)) {
        this.level = level;
        this.sink = sink;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
            return;
        }

        const timestamp = new Date().toISOString();
        const contextStr = context ? ` ${JSON.stringify(context)}` : '';
        this.sink(sanitizeMessage(`[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`));
    }

    private describeError(error: unknown): string {
        if (error instanceof Error) {
            return `${error.message}${error.stack ? `\n${error.stack}` : ''}`;
        }
        return String(error);
    }

    debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    error(message: string, error?: unknown, context?: LogContext): void {
        const errorStr = error !== undefined ? `: ${this.describeError(error)}` : '';
        this.write('error', `${message}${errorStr}`, context);
    }
}

export const logger = new Logger();
