export type ErrorMeta = Record<string, unknown>;

export class AppError extends Error {
    public readonly code: string;
    public readonly meta: ErrorMeta;

    constructor(message: string, code: string = 'INTERNAL_ERROR', meta: ErrorMeta = {}) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.meta = meta;
        Error.captureStackTrace(this, this.constructor);
    }
}

export type CalendarFailureReason = 'auth' | 'permission' | 'not_found' | 'timeout' | 'unavailable';

export class CalendarProviderError extends AppError {
    public readonly reason: CalendarFailureReason;

    constructor(message: string, reason: CalendarFailureReason = 'unavailable', meta: ErrorMeta = {}) {
        super(message, 'CALENDAR_PROVIDER_ERROR', { reason, ...meta });
        this.reason = reason;
    }
}

export class ConfigError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'CONFIG_ERROR', meta);
    }
}

export function errorDetails(error: unknown): ErrorMeta {
    if (error instanceof AppError) {
        return { name: error.name, code: error.code, message: error.message, ...error.meta };
    }
    if (error instanceof Error) {
        return { name: error.name, message: error.message, stack: error.stack };
    }
    return { value: String(error) };
}
