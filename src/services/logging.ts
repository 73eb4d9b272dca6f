import fs from 'fs';
import path from 'path';
import { config, LogLevel } from '../config';

export type LogMeta = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

class Logger {
    private logStream?: fs.WriteStream;

    constructor(private readonly minLevel: LogLevel) {
        if (config.nodeEnv !== 'production') return;

        const logDir = path.resolve(config.paths.logs);
        if (!fs.existsSync(logDir)) {
            try {
                fs.mkdirSync(logDir, { recursive: true });
            } catch (e) {
                console.error(`Failed to create log directory at ${logDir}:`, e);
                return;
            }
        }

        const logFile = path.join(logDir, `${new Date().toISOString().split('T')[0]}.log`);
        this.logStream = fs.createWriteStream(logFile, { flags: 'a' });
        this.logStream.on('error', (err) => {
            console.error('Failed to write to log file stream:', err);
        });
    }

    private log(level: LogLevel, message: string, meta?: LogMeta) {
        if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.minLevel]) return;

        const logString = JSON.stringify({
            timestamp: new Date().toISOString(),
            level,
            message,
            ...meta
        });

        if (level === 'error') {
            console.error(logString);
        } else if (level === 'warn') {
            console.warn(logString);
        } else {
            console.log(logString);
        }

        if (this.logStream?.writable) {
            this.logStream.write(logString + '\n');
        }
    }

    debug(message: string, meta?: LogMeta) {
        this.log('debug', message, meta);
    }

    info(message: string, meta?: LogMeta) {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: LogMeta) {
        this.log('warn', message, meta);
    }

    error(message: string, meta?: LogMeta) {
        this.log('error', message, meta);
    }

    close(): void {
        this.logStream?.end();
    }
}

export const logger = new Logger(config.logLevel);
