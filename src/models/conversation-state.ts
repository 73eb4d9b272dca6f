export enum Stage {
    INITIAL = 'initial',
    GATHERING_INFO = 'gathering_info',
    PRESENTING_OPTIONS = 'presenting_options',
    PRESENTING_ALTERNATIVES = 'presenting_alternatives',
    CONFIRMING = 'confirming',
    CONFIRMED = 'booking_confirmed'
}

export enum Intent {
    BOOK_APPOINTMENT = 'book_appointment',
    CHECK_AVAILABILITY = 'check_availability',
    CONFIRM_BOOKING = 'confirm_booking',
    REQUEST_ALTERNATIVES = 'request_alternatives',
    MODIFY_BOOKING = 'modify_booking',
    GENERAL_INQUIRY = 'general_inquiry'
}

/** Local calendar date in `YYYY-MM-DD` form. */
export type CalendarDate = string;

export interface Slot {
    readonly start: Date;
    readonly end: Date;
    /** e.g. "Wednesday, October 21, 2026" */
    readonly label: string;
    /** e.g. "02:00 PM" */
    readonly timeLabel: string;
    readonly durationLabel: string;
}

export interface BusyInterval {
    start: Date;
    end: Date;
}

export interface WorkingHours {
    startHour: number;
    endHour: number;
}

export interface ExtractedInfo {
    preferredDate?: CalendarDate;
    /** Raw matched text, e.g. "2:30 pm" or "afternoon". */
    timePreference?: string;
    duration: string;
}

export interface ChatMessage {
    role: 'user' | 'assistant';
    content: string;
    timestamp: string;
}

export interface ConversationState {
    stage: Stage;
    intent: Intent | null;
    extractedInfo: ExtractedInfo;
    availableSlots: Slot[];
    bookingConfirmed: boolean;
    turnCount: number;
    history: ChatMessage[];
    lastResponse: string;
}

export const DEFAULT_DURATION = '1 hour';

export function createConversationState(): ConversationState {
    return {
        stage: Stage.INITIAL,
        intent: null,
        extractedInfo: { duration: DEFAULT_DURATION },
        availableSlots: [],
        bookingConfirmed: false,
        turnCount: 0,
        history: [],
        lastResponse: ''
    };
}

export function cloneConversationState(state: ConversationState): ConversationState {
    return {
        ...state,
        extractedInfo: { ...state.extractedInfo },
        availableSlots: state.availableSlots.map(slot => ({
            ...slot,
            start: new Date(slot.start.getTime()),
            end: new Date(slot.end.getTime())
        })),
        history: [...state.history]
    };
}
