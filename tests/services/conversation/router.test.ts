import { BusyInterval, createConversationState, Intent, Stage } from '../../../src/models/conversation-state';
import { IntentDetector } from '../../../src/services/conversation/intent-detector';
import { logger } from '../../../src/services/logging';
import { GREETING } from '../../../src/services/conversation/response-composer';
import {
    assignStage,
    ConversationRouter,
    routeAfterAvailability,
    routeAfterIntent,
    TURN_FAILURE_RESPONSE
} from '../../../src/services/conversation/router';
import { SessionStore } from '../../../src/services/conversation/session-store';
import { mockSlots } from '../../../src/services/scheduling/availability-engine';
import { InMemoryCalendarProvider } from '../../../src/services/scheduling/in-memory-calendar';
import { CalendarResult } from '../../../src/services/scheduling/interfaces';
import { SchedulerService } from '../../../src/services/scheduling/scheduler';
import { CalendarProviderError } from '../../../src/utils/errors';

// Wednesday, October 21, 2026 08:30 local time
const now = new Date(2026, 9, 21, 8, 30);
const oct = (d: number, h: number, m: number = 0) => new Date(2026, 9, d, h, m);

class HangingCalendarProvider extends InMemoryCalendarProvider {
    listBusyIntervalsForDay(): Promise<CalendarResult<BusyInterval[]>> {
        return new Promise(() => undefined);
    }
}

class BrokenIntentDetector extends IntentDetector {
    detectIntent(): Intent {
        throw new Error('classifier offline');
    }
}

function setup(provider = new InMemoryCalendarProvider()) {
    const sessions = new SessionStore(60_000);
    const scheduler = new SchedulerService(provider, { timeoutMs: 50, workingHours: { startHour: 9, endHour: 17 } });
    const router = new ConversationRouter({ sessions, scheduler, lookaheadDays: 3, maxSuggestions: 5 });
    return { sessions, scheduler, router, provider };
}

describe('ConversationRouter', () => {
    afterEach(() => jest.restoreAllMocks());

    test('first booking turn extracts the date and presents options', async () => {
        const { router } = setup();
        const info = jest.spyOn(logger, 'info');

        const { response, state } = await router.advanceConversation(
            's1', 'I want to schedule a meeting tomorrow afternoon', now
        );

        expect(state.intent).toBe(Intent.BOOK_APPOINTMENT);
        expect(state.extractedInfo).toEqual({ preferredDate: '2026-10-22', timePreference: 'afternoon', duration: '1 hour' });
        expect(state.stage).toBe(Stage.PRESENTING_OPTIONS);
        expect(state.availableSlots).toHaveLength(8);
        expect(state.bookingConfirmed).toBe(false);
        expect(state.turnCount).toBe(1);
        expect(response).toBe(
            'I found some available time slots for you:\n\n' +
            '1. Thursday, October 22, 2026 at 09:00 AM (1 hour)\n' +
            '2. Thursday, October 22, 2026 at 10:00 AM (1 hour)\n' +
            '3. Thursday, October 22, 2026 at 11:00 AM (1 hour)\n\n' +
            "Which time works best for you? Just let me know the number or tell me if you'd like to see other options."
        );
        expect(info.mock.calls.map(c => c[0])).toEqual(expect.arrayContaining([
            'Stage transition: initial -> gathering_info',
            'Stage transition: gathering_info -> presenting_options',
        ]));
        expect(state.history.map(m => m.role)).toEqual(['user', 'assistant']);
    });

    test('second turn confirms against the offered slots', async () => {
        const { router } = setup();
        await router.advanceConversation('s1', 'I want to schedule a meeting tomorrow afternoon', now);

        const { response, state } = await router.advanceConversation('s1', 'yes, that works', now);

        expect(state.intent).toBe(Intent.CONFIRM_BOOKING);
        expect(state.bookingConfirmed).toBe(true);
        expect(state.stage).toBe(Stage.CONFIRMED);
        expect(response).toBe("Great! I've confirmed your appointment. You should receive a confirmation email shortly. " +
            'Is there anything else I can help you with?');
        expect(state.turnCount).toBe(2);
    });

    test('"yes, book it" is a booking request and re-checks the known date', async () => {
        const { router, provider } = setup();
        await router.advanceConversation('s1', 'I want to schedule a meeting tomorrow afternoon', now);
        provider.addBusy({ start: oct(22, 9), end: oct(22, 10) });

        const { state } = await router.advanceConversation('s1', 'yes, book it', now);

        expect(state.intent).toBe(Intent.BOOK_APPOINTMENT);
        expect(state.bookingConfirmed).toBe(false);
        expect(state.stage).toBe(Stage.PRESENTING_OPTIONS);
        expect(state.availableSlots[0].timeLabel).toBe('10:00 AM');
    });

    test('confirmation without offered slots silently fails', async () => {
        const { router } = setup();

        const { response, state } = await router.advanceConversation('s1', 'yes', now);

        expect(state.intent).toBe(Intent.CONFIRM_BOOKING);
        expect(state.bookingConfirmed).toBe(false);
        expect(state.stage).toBe(Stage.INITIAL);
        expect(response).toBe(GREETING);
    });

    test('substitutes mock slots when the calendar fails', async () => {
        const provider = new InMemoryCalendarProvider();
        provider.failWith(new CalendarProviderError('Calendar authentication expired. Please reconnect.', 'auth'));
        const { router } = setup(provider);
        const warn = jest.spyOn(logger, 'warn');

        const { response, state } = await router.advanceConversation('s1', 'book a call tomorrow', now);

        expect(state.availableSlots).toEqual(mockSlots(now));
        expect(state.availableSlots).toHaveLength(5);
        expect(state.stage).toBe(Stage.PRESENTING_OPTIONS);
        expect(response).not.toContain('authentication');
        expect(warn).toHaveBeenCalledWith('Calendar lookup failed, offering placeholder slots', expect.objectContaining({
            sessionId: 's1',
            reason: 'auth'
        }));
    });

    test('substitutes mock slots when the calendar times out', async () => {
        const { router } = setup(new HangingCalendarProvider());

        const { state } = await router.advanceConversation('s1', 'book a call tomorrow', now);

        expect(state.availableSlots.map(s => s.timeLabel)).toEqual(['10:00 AM', '11:00 AM', '12:00 PM', '10:00 AM', '11:00 AM']);
    });

    test('searches the lookahead window when no date is given', async () => {
        const { router } = setup(new InMemoryCalendarProvider([{ start: oct(21, 9), end: oct(21, 12) }]));

        const { state } = await router.advanceConversation('s1', 'Are there any free slots?', now);

        expect(state.intent).toBe(Intent.CHECK_AVAILABILITY);
        expect(state.extractedInfo.preferredDate).toBeUndefined();
        expect(state.availableSlots.map(s => s.start)).toEqual([
            oct(21, 12), oct(21, 13), oct(21, 14), oct(21, 15), oct(21, 16)
        ]);
        expect(state.stage).toBe(Stage.PRESENTING_OPTIONS);
    });

    test('reports no availability for a fully booked day', async () => {
        const fullDay = [9, 10, 11, 12, 13, 14, 15, 16].map(h => ({ start: oct(22, h), end: oct(22, h + 1) }));
        const { router } = setup(new InMemoryCalendarProvider(fullDay));

        const { response, state } = await router.advanceConversation('s1', 'Is there free time tomorrow?', now);

        expect(state.availableSlots).toEqual([]);
        expect(state.stage).toBe(Stage.GATHERING_INFO);
        expect(response).toBe("I don't see any available slots for your preferred time. " +
            'Could you suggest an alternative time or date?');
    });

    test('leaves the session untouched when a turn fails', async () => {
        const { router, sessions, scheduler } = setup();
        await router.advanceConversation('s1', 'I want to schedule a meeting tomorrow afternoon', now);
        const before = sessions.get('s1');

        const broken = new ConversationRouter({ sessions, scheduler, intents: new BrokenIntentDetector() });
        const { response, state } = await broken.advanceConversation('s1', 'yes, that works', now);

        expect(response).toBe(TURN_FAILURE_RESPONSE);
        expect(state).toEqual(before);
        expect(sessions.get('s1')?.turnCount).toBe(1);
    });

    test('serialises concurrent turns on one session', async () => {
        const { router, sessions } = setup();

        await Promise.all([
            router.advanceConversation('s1', 'I want to schedule a meeting tomorrow afternoon', now),
            router.advanceConversation('s1', 'yes, that works', now),
        ]);

        const state = sessions.get('s1');
        expect(state?.turnCount).toBe(2);
        expect(state?.bookingConfirmed).toBe(true);
        expect(state?.history.map(m => m.role)).toEqual(['user', 'assistant', 'user', 'assistant']);
        expect(state?.history.filter(m => m.role === 'user').map(m => m.content)).toEqual([
            'I want to schedule a meeting tomorrow afternoon',
            'yes, that works',
        ]);
    });
});

describe('routing decisions', () => {
    test('assigns the turn stage from the previous turn', () => {
        const fresh = createConversationState();
        expect(assignStage(fresh, Intent.CONFIRM_BOOKING)).toBe(Stage.INITIAL);

        const returning = { ...fresh, turnCount: 2 };
        expect(assignStage(returning, Intent.CONFIRM_BOOKING)).toBe(Stage.CONFIRMING);
        expect(assignStage(returning, Intent.GENERAL_INQUIRY)).toBe(Stage.GATHERING_INFO);
        expect(assignStage({ ...returning, availableSlots: mockSlots(now) }, Intent.GENERAL_INQUIRY))
            .toBe(Stage.PRESENTING_OPTIONS);
    });

    test('routes after intent', () => {
        const base = createConversationState();
        const dated = { ...base, extractedInfo: { preferredDate: '2026-10-22', duration: '1 hour' } };

        expect(routeAfterIntent({ ...base, intent: Intent.CONFIRM_BOOKING })).toBe('confirm');
        expect(routeAfterIntent({ ...base, intent: Intent.BOOK_APPOINTMENT })).toBe('extract');
        expect(routeAfterIntent({ ...dated, intent: Intent.CHECK_AVAILABILITY })).toBe('checkAvailability');
        expect(routeAfterIntent({ ...base, intent: Intent.REQUEST_ALTERNATIVES })).toBe('respond');
        expect(routeAfterIntent({ ...base, intent: Intent.MODIFY_BOOKING })).toBe('respond');
    });

    test('routes after availability', () => {
        const base = createConversationState();
        const withSlots = { ...base, availableSlots: mockSlots(now) };

        expect(routeAfterAvailability({ ...base, intent: Intent.REQUEST_ALTERNATIVES })).toBe('suggestAlternatives');
        expect(routeAfterAvailability({ ...withSlots, intent: Intent.CONFIRM_BOOKING })).toBe('confirm');
        expect(routeAfterAvailability({ ...withSlots, intent: Intent.BOOK_APPOINTMENT })).toBe('respond');
        expect(routeAfterAvailability({ ...base, intent: Intent.CHECK_AVAILABILITY })).toBe('respond');
    });
});
