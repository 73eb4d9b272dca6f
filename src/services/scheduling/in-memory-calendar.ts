import { randomUUID } from 'crypto';
import { BusyInterval, CalendarDate } from '../../models/conversation-state';
import { DateTimeUtils } from '../../utils/date-time';
import { CalendarProviderError } from '../../utils/errors';
import { CalendarEvent, CalendarProvider, CalendarResult, CreateEventRequest, failure, success } from './interfaces';

/**
 * Process-local calendar. Used when Google credentials are absent and by
 * the test suite; `failWith` makes every call report the given error.
 */
export class InMemoryCalendarProvider implements CalendarProvider {
    readonly name = 'in-memory';

    private busy: BusyInterval[];
    private events: CalendarEvent[] = [];
    private forcedError: CalendarProviderError | null = null;

    constructor(busy: BusyInterval[] = []) {
        this.busy = [...busy];
    }

    failWith(error: CalendarProviderError | null): void {
        this.forcedError = error;
    }

    addBusy(interval: BusyInterval): void {
        this.busy.push(interval);
    }

    listEvents(): CalendarEvent[] {
        return [...this.events];
    }

    async listBusyIntervalsForDay(day: CalendarDate): Promise<CalendarResult<BusyInterval[]>> {
        const start = DateTimeUtils.fromCalendarDate(day);
        return this.listBusyIntervals(start, DateTimeUtils.addDays(start, 1));
    }

    async listBusyIntervals(windowStart: Date, windowEnd: Date): Promise<CalendarResult<BusyInterval[]>> {
        if (this.forcedError) return failure(this.forcedError);

        const overlapping = this.busy
            .filter(b => b.start.getTime() < windowEnd.getTime() && b.end.getTime() > windowStart.getTime())
            .sort((a, b) => a.start.getTime() - b.start.getTime())
            .map(b => ({ start: b.start, end: b.end }));

        return success(overlapping);
    }

    async listUpcomingEvents(from: Date, maxResults: number): Promise<CalendarResult<CalendarEvent[]>> {
        if (this.forcedError) return failure(this.forcedError);

        const upcoming = this.events
            .filter(e => new Date(e.end).getTime() > from.getTime())
            .sort((a, b) => new Date(a.start).getTime() - new Date(b.start).getTime())
            .slice(0, maxResults);

        return success(upcoming);
    }

    async createEvent(request: CreateEventRequest): Promise<CalendarResult<CalendarEvent>> {
        if (this.forcedError) return failure(this.forcedError);

        const event: CalendarEvent = {
            id: randomUUID(),
            summary: request.summary,
            start: request.start.toISOString(),
            end: request.end.toISOString(),
            description: request.description,
            attendees: request.attendeeEmail ? [request.attendeeEmail] : undefined
        };

        this.events.push(event);
        this.busy.push({ start: request.start, end: request.end });
        return success(event);
    }
}
