/**
 * Structured logging for the extraction and write-back pipeline.
 * Loggers are created per run and passed down explicitly; scopes share one buffer.
 */

import fs from 'fs/promises';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    scope?: string;
    message: string;
    context?: LogContext;
    stack?: string;
}

export interface LoggerOptions {
    scope?: string;
    level?: LogLevel;
    console?: boolean;
    maxLogs?: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

class LogBuffer {
    readonly entries: LogEntry[] = [];

    constructor(private readonly maxLogs: number) {}

    push(entry: LogEntry) {
        this.entries.push(entry);
        if (this.entries.length > this.maxLogs) {
            this.entries.shift();
        }
    }

    clear() {
        this.entries.length = 0;
    }
}

export class Logger {
    private readonly scope?: string;
    private readonly minLevel: LogLevel;
    private readonly toConsole: boolean;
    private readonly buffer: LogBuffer;

    constructor(options: LoggerOptions = {}, buffer?: LogBuffer) {
        this.scope = options.scope;
        this.minLevel = options.level ?? 'info';
        this.toConsole = options.console ?? true;
        this.buffer = buffer ?? new LogBuffer(options.maxLogs ?? 1000);
    }

    /**
     * Scoped logger writing into the same buffer, e.g. one per document
     */
    child(scope: string): Logger {
        const childScope = this.scope ? `${this.scope}:${scope}` : scope;
        return new Logger({ scope: childScope, level: this.minLevel, console: this.toConsole }, this.buffer);
    }

    private log(level: LogLevel, message: string, context?: LogContext, error?: Error) {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            scope: this.scope,
            message,
            context,
            stack: error?.stack
        };
        this.buffer.push(entry);

        if (!this.toConsole) return;

        const emoji = { debug: '🔍', info: 'ℹ️', warn: '⚠️', error: '❌' }[level];
        const color = { debug: '\x1b[36m', info: '\x1b[32m', warn: '\x1b[33m', error: '\x1b[31m' }[level];
        const reset = '\x1b[0m';
        const prefix = this.scope ? `[${this.scope}] ` : '';

        console.log(`${color}${emoji} [${level.toUpperCase()}]${reset} ${prefix}${message}`, context ?? '');
        if (error?.stack && this.minLevel === 'debug') console.error(error.stack);
    }

    debug(message: string, context?: LogContext) {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext) {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext) {
        this.log('warn', message, context);
    }

    error(message: string, contextOrError?: LogContext | Error) {
        const isError = contextOrError instanceof Error;
        this.log('error', message, isError ? { error: contextOrError.message } : contextOrError, isError ? contextOrError : undefined);
    }

    getLogs(): LogEntry[] {
        return [...this.buffer.entries];
    }

    getLogsByLevel(level: LogLevel): LogEntry[] {
        return this.buffer.entries.filter(log => log.level === level);
    }

    /**
     * Write the buffer as JSON, creating the parent directory if needed
     */
    async exportLogs(filePath = runLogFileName()): Promise<string> {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, JSON.stringify(this.getLogs(), null, 2), 'utf-8');
        return filePath;
    }

    clear() {
        this.buffer.clear();
    }
}

// One file per day: translation-2024-05-01.json
export function runLogFileName(date: Date = new Date()): string {
    return `translation-${date.toISOString().split('T')[0]}.json`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    return new Logger(options);
}

// Buffer-only logger for library callers that do not pass one
export function createSilentLogger(): Logger {
    return new Logger({ level: 'debug', console: false, maxLogs: 200 });
}
