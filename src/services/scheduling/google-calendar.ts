import { google, Auth, calendar_v3 } from 'googleapis';
import { config } from '../../config';
import { BusyInterval, CalendarDate } from '../../models/conversation-state';
import { DateTimeUtils } from '../../utils/date-time';
import { CalendarFailureReason, CalendarProviderError } from '../../utils/errors';
import { logger } from '../logging';
import { CalendarEvent, CalendarProvider, CalendarResult, CreateEventRequest, failure, success } from './interfaces';

export interface GoogleCalendarOptions {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    refreshToken: string;
    calendarId: string;
    /** Per-request timeout handed to the HTTP client so abandoned calls are torn down. */
    timeoutMs: number;
}

function statusOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('code' in error) {
        const code = Number(error.code);
        if (Number.isInteger(code)) return code;
    }
    if ('status' in error && typeof error.status === 'number') return error.status;
    return undefined;
}

function toProviderError(error: unknown, operation: string): CalendarProviderError {
    const status = statusOf(error);
    const detail = error instanceof Error ? error.message : String(error);

    let reason: CalendarFailureReason = 'unavailable';
    let message = `Calendar API error: ${detail}`;
    if (status === 401) {
        reason = 'auth';
        message = 'Calendar authentication expired. Please reconnect.';
    } else if (status === 403) {
        reason = 'permission';
        message = 'Insufficient calendar permissions.';
    } else if (status === 404) {
        reason = 'not_found';
        message = 'Calendar not found.';
    }

    return new CalendarProviderError(message, reason, { operation, status, detail });
}

export class GoogleCalendarProvider implements CalendarProvider {
    readonly name = 'google';

    private readonly calendar: calendar_v3.Calendar;
    private readonly calendarId: string;
    private readonly requestOptions: { timeout: number };

    constructor(options: GoogleCalendarOptions = { ...config.google, timeoutMs: config.calendar.timeoutMs }) {
        const oauth2Client: Auth.OAuth2Client = new google.auth.OAuth2(
            options.clientId,
            options.clientSecret,
            options.redirectUri
        );
        oauth2Client.setCredentials({ refresh_token: options.refreshToken });

        this.calendar = google.calendar({ version: 'v3', auth: oauth2Client });
        this.calendarId = options.calendarId;
        this.requestOptions = { timeout: options.timeoutMs };
    }

    async listBusyIntervalsForDay(day: CalendarDate): Promise<CalendarResult<BusyInterval[]>> {
        const start = DateTimeUtils.fromCalendarDate(day);
        return this.listBusyIntervals(start, DateTimeUtils.addDays(start, 1));
    }

    async listBusyIntervals(windowStart: Date, windowEnd: Date): Promise<CalendarResult<BusyInterval[]>> {
        try {
            const response = await this.calendar.freebusy.query({
                requestBody: {
                    timeMin: windowStart.toISOString(),
                    timeMax: windowEnd.toISOString(),
                    items: [{ id: this.calendarId }]
                }
            }, this.requestOptions);

            const busy = response.data.calendars?.[this.calendarId]?.busy || [];
            const intervals: BusyInterval[] = [];
            for (const b of busy) {
                if (b.start && b.end) {
                    intervals.push({ start: new Date(b.start), end: new Date(b.end) });
                }
            }
            return success(intervals);
        } catch (error) {
            logger.error('Google Calendar freebusy query failed', { calendarId: this.calendarId, error: String(error) });
            return failure(toProviderError(error, 'freebusy.query'));
        }
    }

    async listUpcomingEvents(from: Date, maxResults: number): Promise<CalendarResult<CalendarEvent[]>> {
        try {
            const response = await this.calendar.events.list({
                calendarId: this.calendarId,
                timeMin: from.toISOString(),
                maxResults,
                singleEvents: true,
                orderBy: 'startTime'
            }, this.requestOptions);

            const events: CalendarEvent[] = [];
            for (const item of response.data.items || []) {
                const start = item.start?.dateTime || item.start?.date;
                const end = item.end?.dateTime || item.end?.date;
                if (!item.id || !start || !end) continue;
                events.push({
                    id: item.id,
                    summary: item.summary || 'No title',
                    start,
                    end,
                    description: item.description || undefined,
                    location: item.location || undefined,
                    htmlLink: item.htmlLink || undefined
                });
            }
            return success(events);
        } catch (error) {
            logger.error('Google Calendar events list failed', { calendarId: this.calendarId, error: String(error) });
            return failure(toProviderError(error, 'events.list'));
        }
    }

    async createEvent(request: CreateEventRequest): Promise<CalendarResult<CalendarEvent>> {
        try {
            const response = await this.calendar.events.insert({
                calendarId: this.calendarId,
                requestBody: {
                    summary: request.summary,
                    description: request.description,
                    start: { dateTime: request.start.toISOString() },
                    end: { dateTime: request.end.toISOString() },
                    attendees: request.attendeeEmail ? [{ email: request.attendeeEmail }] : undefined
                }
            }, this.requestOptions);

            const created = response.data;
            if (!created.id) {
                return failure(new CalendarProviderError('Calendar did not return an event id', 'unavailable'));
            }

            return success({
                id: created.id,
                summary: created.summary || request.summary,
                start: created.start?.dateTime || request.start.toISOString(),
                end: created.end?.dateTime || request.end.toISOString(),
                description: created.description || undefined,
                attendees: (created.attendees || []).flatMap(a => (a.email ? [a.email] : [])),
                htmlLink: created.htmlLink || undefined
            });
        } catch (error) {
            logger.error('Google Calendar event insert failed', { calendarId: this.calendarId, error: String(error) });
            return failure(toProviderError(error, 'events.insert'));
        }
    }
}
