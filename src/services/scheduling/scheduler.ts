import { config, isGoogleCalendarConfigured } from '../../config';
import { BusyInterval, CalendarDate, Slot, WorkingHours } from '../../models/conversation-state';
import { CalendarProviderError } from '../../utils/errors';
import { logger } from '../logging';
import { freeSlots, windowMockSlots } from './availability-engine';
import { GoogleCalendarProvider } from './google-calendar';
import { InMemoryCalendarProvider } from './in-memory-calendar';
import { CalendarEvent, CalendarProvider, CalendarResult, CreateEventRequest, failure } from './interfaces';

export interface SchedulerOptions {
    timeoutMs: number;
    workingHours: WorkingHours;
}

export interface AvailabilityResult {
    slots: Slot[];
    /** True when the calendar could not be read and placeholder slots were returned. */
    degraded: boolean;
}

export function createCalendarProvider(): CalendarProvider {
    if (isGoogleCalendarConfigured()) {
        return new GoogleCalendarProvider();
    }
    logger.warn('Google Calendar not configured, using in-memory calendar');
    return new InMemoryCalendarProvider();
}

/**
 * Wraps a CalendarProvider with a bounded wait. A call that throws or
 * outlives `timeoutMs` comes back as a provider-error result.
 */
export class SchedulerService {
    private readonly options: SchedulerOptions;

    constructor(
        private readonly provider: CalendarProvider,
        options: Partial<SchedulerOptions> = {}
    ) {
        this.options = {
            timeoutMs: options.timeoutMs ?? config.calendar.timeoutMs,
            workingHours: options.workingHours ?? config.scheduling.workingHours
        };
    }

    get providerName(): string {
        return this.provider.name;
    }

    get workingHours(): WorkingHours {
        return this.options.workingHours;
    }

    busyForDay(day: CalendarDate): Promise<CalendarResult<BusyInterval[]>> {
        return this.bounded('listBusyIntervalsForDay', () => this.provider.listBusyIntervalsForDay(day));
    }

    busyForWindow(windowStart: Date, windowEnd: Date): Promise<CalendarResult<BusyInterval[]>> {
        return this.bounded('listBusyIntervals', () => this.provider.listBusyIntervals(windowStart, windowEnd));
    }

    async checkAvailability(windowStart: Date, windowEnd: Date, durationMinutes: number): Promise<AvailabilityResult> {
        const busy = await this.busyForWindow(windowStart, windowEnd);

        if (!busy.ok) {
            logger.warn('Calendar unavailable, returning placeholder availability', {
                provider: this.provider.name,
                reason: busy.error.reason,
                error: busy.error.message
            });
            return {
                slots: windowMockSlots(windowStart, windowEnd, durationMinutes, this.options.workingHours),
                degraded: true
            };
        }

        return {
            slots: freeSlots(busy.value, windowStart, windowEnd, durationMinutes, this.options.workingHours),
            degraded: false
        };
    }

    upcomingEvents(maxResults: number, from: Date = new Date()): Promise<CalendarResult<CalendarEvent[]>> {
        return this.bounded('listUpcomingEvents', () => this.provider.listUpcomingEvents(from, maxResults));
    }

    async bookAppointment(request: CreateEventRequest): Promise<CalendarResult<CalendarEvent>> {
        const result = await this.bounded('createEvent', () => this.provider.createEvent(request));
        if (result.ok) {
            logger.info('Appointment booked', {
                provider: this.provider.name,
                eventId: result.value.id,
                start: result.value.start
            });
        }
        return result;
    }

    private bounded<T>(operation: string, call: () => Promise<CalendarResult<T>>): Promise<CalendarResult<T>> {
        const { timeoutMs } = this.options;
        let timer: NodeJS.Timeout | undefined;

        const timeout = new Promise<CalendarResult<T>>(resolve => {
            timer = setTimeout(() => {
                resolve(failure(new CalendarProviderError(
                    `Calendar ${operation} timed out after ${timeoutMs}ms`,
                    'timeout',
                    { operation, timeoutMs }
                )));
            }, timeoutMs);
        });

        const attempt = call().catch((error: unknown) => failure<T>(new CalendarProviderError(
            `Calendar ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
            'unavailable',
            { operation }
        )));

        return Promise.race([attempt, timeout]).finally(() => clearTimeout(timer));
    }
}
