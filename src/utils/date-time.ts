import { CalendarDate } from '../models/conversation-state';

const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTH_NAMES = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December'
];

const MINUTE_MS = 60_000;

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Local-time date helpers. Everything here works on the host's local
 * calendar; no timezone conversion is attempted.
 */
export class DateTimeUtils {
    static toCalendarDate(date: Date): CalendarDate {
        return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
    }

    static fromCalendarDate(value: CalendarDate): Date {
        const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
        if (!match) {
            throw new Error(`Invalid calendar date: ${value}`);
        }
        return new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
    }

    static isCalendarDate(value: string): boolean {
        return /^\d{4}-\d{2}-\d{2}$/.test(value)
            && DateTimeUtils.toCalendarDate(DateTimeUtils.fromCalendarDate(value)) === value;
    }

    static startOfDay(date: Date): Date {
        return new Date(date.getFullYear(), date.getMonth(), date.getDate());
    }

    static atHour(date: Date, hour: number, minute: number = 0): Date {
        return new Date(date.getFullYear(), date.getMonth(), date.getDate(), hour, minute);
    }

    static addDays(date: Date, days: number): Date {
        const next = new Date(date.getTime());
        next.setDate(next.getDate() + days);
        return next;
    }

    static addMinutes(date: Date, minutes: number): Date {
        return new Date(date.getTime() + minutes * MINUTE_MS);
    }

    /** "Wednesday, October 21, 2026" */
    static formatDateLabel(date: Date): string {
        return `${WEEKDAY_NAMES[date.getDay()]}, ${MONTH_NAMES[date.getMonth()]} ${pad2(date.getDate())}, ${date.getFullYear()}`;
    }

    /** "02:30 PM" */
    static formatTimeLabel(date: Date): string {
        const hours = date.getHours();
        const hour12 = hours % 12 === 0 ? 12 : hours % 12;
        return `${pad2(hour12)}:${pad2(date.getMinutes())} ${hours < 12 ? 'AM' : 'PM'}`;
    }

    static formatDuration(minutes: number): string {
        if (minutes < 60) {
            return `${minutes} minute${minutes === 1 ? '' : 's'}`;
        }
        const hours = Math.floor(minutes / 60);
        const mins = minutes % 60;
        return mins > 0 ? `${hours}h ${mins}m` : `${hours} hour${hours > 1 ? 's' : ''}`;
    }

    static weekdayIndex(name: string): number {
        return WEEKDAY_NAMES.findIndex(day => day.toLowerCase() === name.toLowerCase());
    }
}
