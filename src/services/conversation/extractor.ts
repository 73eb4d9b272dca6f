import { CalendarDate, DEFAULT_DURATION, ExtractedInfo } from '../../models/conversation-state';
import { DateTimeUtils } from '../../utils/date-time';

interface DatePattern {
    pattern: RegExp;
    resolve: (now: Date, match: RegExpExecArray) => Date;
}

const DATE_PATTERNS: readonly DatePattern[] = [
    { pattern: /tomorrow/, resolve: (now) => DateTimeUtils.addDays(now, 1) },
    { pattern: /today/, resolve: (now) => now },
    { pattern: /next week/, resolve: (now) => DateTimeUtils.addDays(now, 7) },
    {
        pattern: /monday|tuesday|wednesday|thursday|friday|saturday|sunday/,
        resolve: (now, match) => nextWeekday(now, DateTimeUtils.weekdayIndex(match[0]))
    },
];

const TIME_PATTERNS: readonly RegExp[] = [
    /(\d{1,2}):(\d{2})\s*(am|pm)/,
    /(\d{1,2})\s*(am|pm)/,
    /(\d{1,2})-(\d{1,2})\s*(am|pm)/,
    /morning/,
    /afternoon/,
    /evening/,
];

const DURATION_PATTERN = /(\d+)\s*(hour|minute)/;

/** Next occurrence strictly after `now`; the same weekday rolls a full week forward. */
export function nextWeekday(now: Date, weekday: number): Date {
    let daysAhead = weekday - now.getDay();
    if (daysAhead <= 0) {
        daysAhead += 7;
    }
    return DateTimeUtils.addDays(now, daysAhead);
}

export function durationToMinutes(duration: string): number {
    const match = DURATION_PATTERN.exec(duration.toLowerCase());
    if (!match) return 60;
    const amount = parseInt(match[1], 10);
    return match[2] === 'hour' ? amount * 60 : amount;
}

function detectDate(text: string, now: Date): CalendarDate | undefined {
    for (const { pattern, resolve } of DATE_PATTERNS) {
        const match = pattern.exec(text);
        if (match) {
            return DateTimeUtils.toCalendarDate(resolve(now, match));
        }
    }
    return undefined;
}

function detectTimePreference(text: string): string | undefined {
    for (const pattern of TIME_PATTERNS) {
        const match = pattern.exec(text);
        if (match) return match[0];
    }
    return undefined;
}

function detectDuration(text: string): string | undefined {
    const match = DURATION_PATTERN.exec(text);
    if (!match) return undefined;
    const amount = parseInt(match[1], 10);
    return `${amount} ${match[2]}${amount === 1 ? '' : 's'}`;
}

/**
 * Pulls date, time-of-day and duration hints out of an utterance and merges
 * them over `priorInfo`. Fields not mentioned this turn keep their prior value.
 */
export function extract(utterance: string, priorInfo: ExtractedInfo, now: Date): ExtractedInfo {
    const text = utterance.toLowerCase();

    const preferredDate = detectDate(text, now) ?? priorInfo.preferredDate;
    const timePreference = detectTimePreference(text) ?? priorInfo.timePreference;
    const duration = detectDuration(text) ?? (priorInfo.duration || DEFAULT_DURATION);

    return {
        ...(preferredDate !== undefined ? { preferredDate } : {}),
        ...(timePreference !== undefined ? { timePreference } : {}),
        duration
    };
}
