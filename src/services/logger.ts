import * as fs from 'fs';
import * as path from 'path';
import type { LogLevelName } from '../types';

export enum LogLevel {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARN = 'WARN',
    ERROR = 'ERROR',
    CRITICAL = 'CRITICAL',
}

const SEVERITY: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 10,
    [LogLevel.INFO]: 20,
    [LogLevel.WARN]: 30,
    [LogLevel.ERROR]: 40,
    [LogLevel.CRITICAL]: 50,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
    switch (name) {
        case 'debug':
            return LogLevel.DEBUG;
        case 'info':
            return LogLevel.INFO;
        case 'warn':
            return LogLevel.WARN;
        case 'error':
            return LogLevel.ERROR;
        case 'critical':
            return LogLevel.CRITICAL;
    }
}

export interface LoggerOptions {
    level?: LogLevel;
}

/**
 * Console logger with an optional per-run log file.
 * One instance is created at process entry and handed to each component.
 */
export class Logger {
    private logFileStream: fs.WriteStream | null = null;
    private logFilePath: string = '';
    private readonly minLevel: LogLevel;

    constructor(options: LoggerOptions = {}) {
        this.minLevel = options.level ?? LogLevel.INFO;
    }

    /**
     * Mirror output to `run-<timestamp>.log` in `logDir`. When the file cannot
     * be created or written, the logger carries on with the console only.
     */
    init(logDir: string) {
        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        const filePath = path.join(logDir, `run-${timestamp}.log`);

        let stream: fs.WriteStream;
        try {
            fs.mkdirSync(logDir, { recursive: true });
            stream = fs.createWriteStream(filePath, { flags: 'a' });
        } catch (error) {
            this.log(LogLevel.WARN, `Cannot write logs to ${logDir}, using console only`, error);
            return;
        }

        stream.on('error', (error) => {
            if (this.logFileStream === stream) {
                this.logFileStream = null;
            }
            this.log(LogLevel.WARN, `Log file ${filePath} unavailable, using console only`, error);
        });

        this.logFilePath = filePath;
        this.logFileStream = stream;
        this.log(LogLevel.INFO, `Logger initialized. Log file: ${this.logFilePath}`);
    }

    private formatMessage(level: LogLevel, message: string, data?: unknown): string {
        const timestamp = new Date().toISOString();
        let logMessage = `[${timestamp}] [${level}] ${message}`;
        if (data !== undefined) {
            if (data instanceof Error) {
                logMessage += `\n${data.stack || data.message}`;
            } else {
                logMessage += ` ${JSON.stringify(data)}`;
            }
        }
        return logMessage;
    }

    private log(level: LogLevel, message: string, data?: unknown) {
        if (SEVERITY[level] < SEVERITY[this.minLevel]) {
            return;
        }

        const logMessage = this.formatMessage(level, message, data);

        if (SEVERITY[level] >= SEVERITY[LogLevel.ERROR]) {
            console.error(logMessage);
        } else {
            console.log(logMessage);
        }

        if (this.logFileStream) {
            this.logFileStream.write(logMessage + '\n');
        }
    }

    debug(message: string, data?: unknown) {
        this.log(LogLevel.DEBUG, message, data);
    }

    info(message: string, data?: unknown) {
        this.log(LogLevel.INFO, message, data);
    }

    warn(message: string, data?: unknown) {
        this.log(LogLevel.WARN, message, data);
    }

    error(message: string, error?: unknown) {
        this.log(LogLevel.ERROR, message, error);
    }

    critical(message: string, error?: unknown) {
        this.log(LogLevel.CRITICAL, message, error);
    }

    get filePath(): string | null {
        return this.logFileStream ? this.logFilePath : null;
    }

    close() {
        if (this.logFileStream) {
            this.logFileStream.end();
            this.logFileStream = null;
        }
    }
}
