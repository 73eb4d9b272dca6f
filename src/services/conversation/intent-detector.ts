import { Intent } from '../../models/conversation-state';

export interface IntentRule {
    intent: Intent;
    keywords: readonly string[];
}

/**
 * Evaluated top to bottom; the first rule with any keyword contained in the
 * lower-cased utterance wins, regardless of where the keyword appears.
 * "no, book it" is therefore a booking request, not a rejection.
 */
export const INTENT_RULES: readonly IntentRule[] = [
    { intent: Intent.BOOK_APPOINTMENT, keywords: ['book', 'schedule', 'appointment', 'meeting', 'call'] },
    { intent: Intent.CHECK_AVAILABILITY, keywords: ['available', 'free', 'time', 'slot'] },
    { intent: Intent.CONFIRM_BOOKING, keywords: ['yes', 'confirm', 'book it', 'that works'] },
    { intent: Intent.REQUEST_ALTERNATIVES, keywords: ['no', 'different', 'other', 'alternative'] },
    { intent: Intent.MODIFY_BOOKING, keywords: ['cancel', 'reschedule', 'change'] },
];

export class IntentDetector {
    constructor(private readonly rules: readonly IntentRule[] = INTENT_RULES) {}

    detectIntent(text: string): Intent {
        const lowered = text.toLowerCase();
        const rule = this.rules.find(r => r.keywords.some(keyword => lowered.includes(keyword)));
        return rule ? rule.intent : Intent.GENERAL_INQUIRY;
    }
}

export const intentDetector = new IntentDetector();
