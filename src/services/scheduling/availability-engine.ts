import { BusyInterval, CalendarDate, Slot, WorkingHours } from '../../models/conversation-state';
import { DateTimeUtils } from '../../utils/date-time';

export const DEFAULT_WORKING_HOURS: WorkingHours = { startHour: 9, endHour: 17 };

const MOCK_SLOT_COUNT = 5;
const MOCK_START_HOUR = 10;

export function buildSlot(start: Date, end: Date, durationLabel: string): Slot {
    return {
        start,
        end,
        label: DateTimeUtils.formatDateLabel(start),
        timeLabel: DateTimeUtils.formatTimeLabel(start),
        durationLabel
    };
}

/**
 * Hourly slots inside working hours on `day`. A candidate is dropped only
 * when a busy interval *starts* inside it; an interval that started earlier
 * and runs into the candidate does not block it. `freeSlots` uses true
 * overlap instead. Both behaviours are kept as-is.
 */
export function slotsForDay(
    busy: readonly BusyInterval[],
    day: CalendarDate,
    workingHours: WorkingHours = DEFAULT_WORKING_HOURS
): Slot[] {
    const date = DateTimeUtils.fromCalendarDate(day);
    const slots: Slot[] = [];

    for (let hour = workingHours.startHour; hour < workingHours.endHour; hour++) {
        const candidateStart = DateTimeUtils.atHour(date, hour);
        const candidateEnd = DateTimeUtils.addMinutes(candidateStart, 60);

        const conflict = busy.some(b =>
            b.start.getTime() >= candidateStart.getTime() && b.start.getTime() < candidateEnd.getTime()
        );

        if (!conflict) {
            slots.push(buildSlot(candidateStart, candidateEnd, '1 hour'));
        }
    }

    return slots;
}

/**
 * Scans every calendar day from `windowStart` to `windowEnd` (inclusive) for
 * `durationMinutes`-long gaps inside working hours. On a conflict the cursor
 * jumps to the end of the blocking interval instead of stepping forward.
 */
export function freeSlots(
    busy: readonly BusyInterval[],
    windowStart: Date,
    windowEnd: Date,
    durationMinutes: number,
    workingHours: WorkingHours = DEFAULT_WORKING_HOURS
): Slot[] {
    const duration = Math.max(1, Math.floor(durationMinutes));
    const durationLabel = DateTimeUtils.formatDuration(duration);
    const sorted = [...busy].sort((a, b) => a.start.getTime() - b.start.getTime());
    const lastDay = DateTimeUtils.startOfDay(windowEnd).getTime();
    const slots: Slot[] = [];

    for (
        let day = DateTimeUtils.startOfDay(windowStart);
        day.getTime() <= lastDay;
        day = DateTimeUtils.addDays(day, 1)
    ) {
        const dayEnd = DateTimeUtils.atHour(day, workingHours.endHour);
        let cursor = DateTimeUtils.atHour(day, workingHours.startHour);

        while (DateTimeUtils.addMinutes(cursor, duration).getTime() <= dayEnd.getTime()) {
            const candidateStart = cursor;
            const candidateEnd = DateTimeUtils.addMinutes(candidateStart, duration);
            const blocking = sorted.find(b =>
                candidateStart.getTime() < b.end.getTime() && candidateEnd.getTime() > b.start.getTime()
            );

            if (blocking) {
                cursor = blocking.end;
            } else {
                slots.push(buildSlot(candidateStart, candidateEnd, durationLabel));
                cursor = candidateEnd;
            }
        }
    }

    return slots;
}

/**
 * Stand-in suggestions used when the calendar cannot be read: five one-hour
 * slots from 10:00 on the day of `now`, one per day, shifted by 0, 1, 2, 0, 1 hours.
 */
export function mockSlots(now: Date): Slot[] {
    const base = DateTimeUtils.atHour(now, MOCK_START_HOUR);
    const slots: Slot[] = [];

    for (let i = 0; i < MOCK_SLOT_COUNT; i++) {
        const start = DateTimeUtils.addMinutes(DateTimeUtils.addDays(base, i), (i % 3) * 60);
        slots.push(buildSlot(start, DateTimeUtils.addMinutes(start, 60), '1 hour'));
    }

    return slots;
}

/** Hourly working-hour slots across a window, ignoring the calendar entirely. */
export function windowMockSlots(
    windowStart: Date,
    windowEnd: Date,
    durationMinutes: number,
    workingHours: WorkingHours = DEFAULT_WORKING_HOURS,
    limit: number = 10
): Slot[] {
    const durationLabel = DateTimeUtils.formatDuration(durationMinutes);
    const slots: Slot[] = [];

    for (
        let cursor = windowStart;
        cursor.getTime() < windowEnd.getTime() && slots.length < limit;
        cursor = DateTimeUtils.addMinutes(cursor, 60)
    ) {
        const hour = cursor.getHours();
        if (hour >= workingHours.startHour && hour < workingHours.endHour) {
            slots.push(buildSlot(cursor, DateTimeUtils.addMinutes(cursor, durationMinutes), durationLabel));
        }
    }

    return slots;
}
