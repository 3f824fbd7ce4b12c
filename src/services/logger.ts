import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARN = 'WARN',
    ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 1,
    [LogLevel.WARN]: 2,
    [LogLevel.ERROR]: 3,
};

export function parseLogLevel(value: string | undefined): LogLevel {
    const upper = (value ?? '').trim().toUpperCase();
    const match = Object.values(LogLevel).find(level => level === upper);
    return match ?? LogLevel.INFO;
}

export class Logger {
    private logFileStream: fs.WriteStream | null = null;
    private logFilePath: string = '';
    private readonly minLevel: LogLevel;

    constructor(minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
        this.minLevel = minLevel;
    }

    init(logDir: string) {
        if (!fs.existsSync(logDir)) {
            fs.mkdirSync(logDir, { recursive: true });
        }

        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        this.logFilePath = path.join(logDir, `run-${timestamp}.log`);
        this.logFileStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });

        this.log(LogLevel.INFO, `Logger initialized. Log file: ${this.logFilePath}`);
    }

    formatMessage(level: LogLevel, message: string, data?: unknown, now: Date = new Date()): string {
        let logMessage = `[${now.toISOString()}] [${level}] ${message}`;
        if (data !== undefined && data !== null) {
            if (data instanceof Error) {
                logMessage += `\n${data.stack || data.message}`;
            } else {
                logMessage += ` ${JSON.stringify(data)}`;
            }
        }
        return logMessage;
    }

    private log(level: LogLevel, message: string, data?: unknown) {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
            return;
        }

        const logMessage = this.formatMessage(level, message, data);

        if (level === LogLevel.ERROR) {
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

    close() {
        if (this.logFileStream) {
            this.logFileStream.end();
            this.logFileStream = null;
        }
    }
}

export const logger = new Logger();
