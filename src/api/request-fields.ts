import { HttpError } from './middleware/error-handler';

function field(body: unknown, key: string): unknown {
    if (typeof body !== 'object' || body === null) return undefined;
    return Object.entries(body).find(([k]) => k === key)?.[1];
}

export function optionalString(body: unknown, key: string): string | undefined {
    const value = field(body, key);
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw new HttpError(400, `${key} must be a string`);
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

export function requireString(body: unknown, key: string): string {
    const value = optionalString(body, key);
    if (value === undefined) {
        throw new HttpError(400, `Missing ${key}`);
    }
    return value;
}

export function requireDate(body: unknown, key: string): Date {
    const date = new Date(requireString(body, key));
    if (Number.isNaN(date.getTime())) {
        throw new HttpError(400, `${key} must be an ISO 8601 date-time`);
    }
    return date;
}

export function optionalPositiveInt(body: unknown, key: string, fallback: number): number {
    const value = field(body, key);
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
        throw new HttpError(400, `${key} must be a positive integer`);
    }
    return value;
}

/** Query-string integer in `[1, max]`; query values always arrive as strings. */
export function queryPositiveInt(query: unknown, key: string, fallback: number, max: number): number {
    const value = field(query, key);
    if (value === undefined) return fallback;
    const parsed = typeof value === 'string' && /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
    if (!(parsed >= 1 && parsed <= max)) {
        throw new HttpError(400, `${key} must be an integer between 1 and ${max}`);
    }
    return parsed;
}
