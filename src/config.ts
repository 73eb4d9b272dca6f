import dotenv from 'dotenv';
import { ConfigError } from './utils/errors';

if (process.env.NODE_ENV !== 'production') {
    dotenv.config();
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface Config {
    port: number;
    nodeEnv: string;
    logLevel: LogLevel;

    paths: {
        logs: string;
    };

    scheduling: {
        workingHours: {
            startHour: number;
            endHour: number;
        };
        lookaheadDays: number;
        maxSuggestions: number;
    };

    calendar: {
        timeoutMs: number;
    };

    session: {
        ttlMinutes: number;
    };

    google: {
        clientId: string;
        clientSecret: string;
        redirectUri: string;
        refreshToken: string;
        calendarId: string;
    };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function getEnvVar(key: string, defaultValue?: string): string {
    const value = process.env[key] || defaultValue;
    if (!value) {
        throw new ConfigError(`Missing required environment variable: ${key}`, { key });
    }
    return value;
}

function getIntVar(key: string, defaultValue: number): number {
    const raw = getEnvVar(key, String(defaultValue));
    const value = parseInt(raw, 10);
    if (Number.isNaN(value)) {
        throw new ConfigError(`Environment variable ${key} must be an integer, got "${raw}"`, { key });
    }
    return value;
}

function getLogLevel(): LogLevel {
    const fallback = process.env.NODE_ENV === 'test' ? 'error' : 'info';
    const raw = getEnvVar('LOG_LEVEL', fallback).toLowerCase();
    const level = LOG_LEVELS.find(l => l === raw);
    if (!level) {
        throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, { value: raw });
    }
    return level;
}

export const config: Config = {
    port: getIntVar('PORT', 3000),
    nodeEnv: getEnvVar('NODE_ENV', 'development'),
    logLevel: getLogLevel(),

    paths: {
        logs: getEnvVar('LOGS_PATH', process.env.NODE_ENV === 'production' ? '/app/data/logs' : './logs'),
    },

    scheduling: {
        workingHours: {
            startHour: getIntVar('WORKING_HOURS_START', 9),
            endHour: getIntVar('WORKING_HOURS_END', 17),
        },
        lookaheadDays: getIntVar('CALENDAR_LOOKAHEAD_DAYS', 3),
        maxSuggestions: getIntVar('MAX_SUGGESTIONS', 5),
    },

    calendar: {
        timeoutMs: getIntVar('CALENDAR_TIMEOUT_MS', 5000),
    },

    session: {
        ttlMinutes: getIntVar('SESSION_TTL_MINUTES', 30),
    },

    google: {
        clientId: process.env.GOOGLE_CLIENT_ID || '',
        clientSecret: process.env.GOOGLE_CLIENT_SECRET || '',
        redirectUri: process.env.GOOGLE_REDIRECT_URI || 'http://localhost:3000/auth/google/callback',
        refreshToken: process.env.GOOGLE_REFRESH_TOKEN || '',
        calendarId: process.env.GOOGLE_CALENDAR_ID || 'primary',
    },
};

export function isGoogleCalendarConfigured(): boolean {
    return Boolean(config.google.clientId && config.google.clientSecret && config.google.refreshToken);
}

// Validation
export function validateEnvironment(): void {
    const errors: string[] = [];
    const { startHour, endHour } = config.scheduling.workingHours;

    if (startHour < 0 || startHour > 23) errors.push('WORKING_HOURS_START must be between 0 and 23');
    if (endHour < 1 || endHour > 24) errors.push('WORKING_HOURS_END must be between 1 and 24');
    if (endHour <= startHour) errors.push('WORKING_HOURS_END must be after WORKING_HOURS_START');
    if (config.calendar.timeoutMs <= 0) errors.push('CALENDAR_TIMEOUT_MS must be positive');
    if (config.scheduling.lookaheadDays < 1) errors.push('CALENDAR_LOOKAHEAD_DAYS must be at least 1');
    if (config.scheduling.maxSuggestions < 1) errors.push('MAX_SUGGESTIONS must be at least 1');
    if (config.session.ttlMinutes < 1) errors.push('SESSION_TTL_MINUTES must be at least 1');

    if (errors.length > 0) {
        throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, { errors });
    }
}
