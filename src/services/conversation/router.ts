import { config } from '../../config';
import {
    cloneConversationState,
    ConversationState,
    createConversationState,
    Intent,
    Slot,
    Stage
} from '../../models/conversation-state';
import { DateTimeUtils } from '../../utils/date-time';
import { errorDetails } from '../../utils/errors';
import { logger } from '../logging';
import { freeSlots, mockSlots, slotsForDay } from '../scheduling/availability-engine';
import { SchedulerService } from '../scheduling/scheduler';
import { durationToMinutes, extract } from './extractor';
import { IntentDetector, intentDetector } from './intent-detector';
import { composeResponse } from './response-composer';
import { SessionStore } from './session-store';

export type Step = 'extract' | 'checkAvailability' | 'suggestAlternatives' | 'confirm' | 'respond';

export interface TurnResult {
    response: string;
    state: ConversationState;
}

export interface ConversationRouterDeps {
    sessions: SessionStore;
    scheduler: SchedulerService;
    intents?: IntentDetector;
    lookaheadDays?: number;
    maxSuggestions?: number;
}

interface TurnContext {
    sessionId: string;
    utterance: string;
    now: Date;
    state: ConversationState;
}

export const TURN_FAILURE_RESPONSE = "I apologize, but I ran into a problem handling that. Please try again.";

const AVAILABILITY_INTENTS: readonly Intent[] = [Intent.BOOK_APPOINTMENT, Intent.CHECK_AVAILABILITY];

/** Stage for the start of a turn, computed from the previous turn's slots. */
export function assignStage(state: ConversationState, intent: Intent): Stage {
    if (state.turnCount === 0) return Stage.INITIAL;
    if (intent === Intent.CONFIRM_BOOKING) return Stage.CONFIRMING;
    if (state.availableSlots.length > 0) return Stage.PRESENTING_OPTIONS;
    return Stage.GATHERING_INFO;
}

export function routeAfterIntent(state: ConversationState): Step {
    if (state.intent === Intent.CONFIRM_BOOKING) return 'confirm';
    if (state.intent && AVAILABILITY_INTENTS.includes(state.intent)) {
        return state.extractedInfo.preferredDate ? 'checkAvailability' : 'extract';
    }
    return 'respond';
}

export function routeAfterAvailability(state: ConversationState): Step {
    const hasSlots = state.availableSlots.length > 0;
    if (!hasSlots && state.intent === Intent.REQUEST_ALTERNATIVES) return 'suggestAlternatives';
    if (hasSlots && state.intent === Intent.CONFIRM_BOOKING) return 'confirm';
    return 'respond';
}

/**
 * Drives one conversation turn through
 * classify -> [extract] -> [availability] -> [alternatives | confirm] -> respond.
 * Every turn ends with a response; nothing loops within a turn.
 */
export class ConversationRouter {
    private readonly sessions: SessionStore;
    private readonly scheduler: SchedulerService;
    private readonly intents: IntentDetector;
    private readonly lookaheadDays: number;
    private readonly maxSuggestions: number;

    constructor(deps: ConversationRouterDeps) {
        this.sessions = deps.sessions;
        this.scheduler = deps.scheduler;
        this.intents = deps.intents ?? intentDetector;
        this.lookaheadDays = deps.lookaheadDays ?? config.scheduling.lookaheadDays;
        this.maxSuggestions = deps.maxSuggestions ?? config.scheduling.maxSuggestions;
    }

    async advanceConversation(sessionId: string, utterance: string, now: Date): Promise<TurnResult> {
        try {
            return await this.sessions.withSession(sessionId, async (current) => {
                const state = await this.runTurn({ sessionId, utterance, now, state: current });
                return { state, result: { response: state.lastResponse, state: cloneConversationState(state) } };
            });
        } catch (error) {
            logger.error('Conversation turn failed, session left unchanged', { sessionId, ...errorDetails(error) });
            return {
                response: TURN_FAILURE_RESPONSE,
                state: this.sessions.get(sessionId) ?? createConversationState()
            };
        }
    }

    private async runTurn(ctx: TurnContext): Promise<ConversationState> {
        const { state, utterance, now } = ctx;
        state.history.push({ role: 'user', content: utterance, timestamp: now.toISOString() });

        const intent = this.intents.detectIntent(utterance);
        state.intent = intent;
        state.bookingConfirmed = false;
        this.transition(ctx, assignStage(state, intent));

        logger.debug('Intent detected', { sessionId: ctx.sessionId, intent });

        let step = routeAfterIntent(state);
        while (step !== 'respond') {
            step = await this.runStep(step, ctx);
        }

        const response = composeResponse(state);
        state.lastResponse = response;
        state.history.push({ role: 'assistant', content: response, timestamp: now.toISOString() });
        state.turnCount += 1;
        return state;
    }

    private async runStep(step: Exclude<Step, 'respond'>, ctx: TurnContext): Promise<Step> {
        switch (step) {
            case 'extract':
                ctx.state.extractedInfo = extract(ctx.utterance, ctx.state.extractedInfo, ctx.now);
                this.transition(ctx, Stage.GATHERING_INFO);
                return 'checkAvailability';
            case 'checkAvailability':
                ctx.state.availableSlots = await this.lookupSlots(ctx);
                this.transition(ctx, ctx.state.availableSlots.length > 0 ? Stage.PRESENTING_OPTIONS : Stage.GATHERING_INFO);
                return routeAfterAvailability(ctx.state);
            case 'suggestAlternatives':
                this.suggestAlternatives(ctx);
                return 'respond';
            case 'confirm':
                this.confirm(ctx);
                return 'respond';
        }
    }

    private async lookupSlots(ctx: TurnContext): Promise<Slot[]> {
        const { preferredDate, duration } = ctx.state.extractedInfo;
        const workingHours = this.scheduler.workingHours;

        if (preferredDate) {
            const busy = await this.scheduler.busyForDay(preferredDate);
            if (!busy.ok) return this.degrade(ctx, busy.error.message, busy.error.reason);
            return slotsForDay(busy.value, preferredDate, workingHours);
        }

        const windowStart = DateTimeUtils.startOfDay(ctx.now);
        const windowEnd = DateTimeUtils.addDays(windowStart, this.lookaheadDays);
        const busy = await this.scheduler.busyForWindow(windowStart, windowEnd);
        if (!busy.ok) return this.degrade(ctx, busy.error.message, busy.error.reason);

        const lastDay = DateTimeUtils.addDays(windowStart, this.lookaheadDays - 1);
        return freeSlots(busy.value, windowStart, lastDay, durationToMinutes(duration), workingHours)
            .slice(0, this.maxSuggestions);
    }

    private degrade(ctx: TurnContext, error: string, reason: string): Slot[] {
        logger.warn('Calendar lookup failed, offering placeholder slots', {
            sessionId: ctx.sessionId,
            provider: this.scheduler.providerName,
            reason,
            error
        });
        return mockSlots(ctx.now);
    }

    private suggestAlternatives(ctx: TurnContext) {
        if (ctx.state.availableSlots.length === 0) {
            ctx.state.availableSlots = mockSlots(ctx.now);
        }
        this.transition(ctx, Stage.PRESENTING_ALTERNATIVES);
    }

    private confirm(ctx: TurnContext) {
        const { state } = ctx;
        if (state.intent === Intent.CONFIRM_BOOKING && state.availableSlots.length > 0) {
            state.bookingConfirmed = true;
            this.transition(ctx, Stage.CONFIRMED);
            logger.info('Booking confirmed', { sessionId: ctx.sessionId, slot: state.availableSlots[0].start.toISOString() });
        } else {
            state.bookingConfirmed = false;
        }
    }

    private transition(ctx: TurnContext, next: Stage) {
        const current = ctx.state.stage;
        if (current === next) return;

        logger.info(`Stage transition: ${current} -> ${next}`, {
            sessionId: ctx.sessionId,
            from: current,
            to: next
        });
        ctx.state.stage = next;
    }
}
