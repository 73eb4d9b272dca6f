import { BusyInterval, CalendarDate } from '../../models/conversation-state';
import { CalendarProviderError } from '../../utils/errors';

export type CalendarResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: CalendarProviderError };

export function success<T>(value: T): CalendarResult<T> {
    return { ok: true, value };
}

export function failure<T>(error: CalendarProviderError): CalendarResult<T> {
    return { ok: false, error };
}

export interface CalendarEvent {
    id: string;
    summary: string;
    start: string; // ISO 8601
    end: string;   // ISO 8601
    description?: string;
    attendees?: string[];
    location?: string;
    htmlLink?: string;
}

export interface CreateEventRequest {
    summary: string;
    start: Date;
    end: Date;
    description?: string;
    attendeeEmail?: string;
}

/**
 * Read side of a calendar, plus event creation for the booking endpoint.
 * Implementations report failures through the result instead of throwing.
 */
export interface CalendarProvider {
    readonly name: string;

    /** Busy intervals between local midnight of `day` and the following midnight. */
    listBusyIntervalsForDay(day: CalendarDate): Promise<CalendarResult<BusyInterval[]>>;

    listBusyIntervals(windowStart: Date, windowEnd: Date): Promise<CalendarResult<BusyInterval[]>>;

    /** Events ending after `from`, earliest first, at most `maxResults`. */
    listUpcomingEvents(from: Date, maxResults: number): Promise<CalendarResult<CalendarEvent[]>>;

    createEvent(request: CreateEventRequest): Promise<CalendarResult<CalendarEvent>>;
}
