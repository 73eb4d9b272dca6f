import { ConversationState, Intent, Slot, Stage } from '../../models/conversation-state';

interface ResponseTemplate {
    name: string;
    matches: (state: ConversationState) => boolean;
    render: (state: ConversationState) => string;
}

function listSlots(slots: readonly Slot[], withDuration: boolean): string {
    return slots
        .map((slot, i) => {
            const line = `${i + 1}. ${slot.label} at ${slot.timeLabel}`;
            return withDuration ? `${line} (${slot.durationLabel})` : line;
        })
        .join('\n');
}

// Order matters: confirmation first, then stage, then intent, then the greeting.
export const RESPONSE_TEMPLATES: readonly ResponseTemplate[] = [
    {
        name: 'confirmed',
        matches: (s) => s.bookingConfirmed,
        render: () => "Great! I've confirmed your appointment. You should receive a confirmation email shortly. " +
            'Is there anything else I can help you with?'
    },
    {
        name: 'presenting_options',
        matches: (s) => s.stage === Stage.PRESENTING_OPTIONS && s.availableSlots.length > 0,
        render: (s) => 'I found some available time slots for you:\n\n' +
            `${listSlots(s.availableSlots.slice(0, 3), true)}\n\n` +
            "Which time works best for you? Just let me know the number or tell me if you'd like to see other options."
    },
    {
        name: 'presenting_alternatives',
        matches: (s) => s.stage === Stage.PRESENTING_ALTERNATIVES,
        render: (s) => 'Let me suggest some alternative times:\n\n' +
            `${listSlots(s.availableSlots.slice(3, 6), true)}\n\n` +
            'Do any of these work better for you?'
    },
    {
        name: 'availability_with_slots',
        matches: (s) => s.intent === Intent.CHECK_AVAILABILITY && s.availableSlots.length > 0,
        render: (s) => 'I have several time slots available. Here are some options:\n\n' +
            `${listSlots(s.availableSlots.slice(0, 3), false)}\n\n` +
            'Would you like to book one of these slots?'
    },
    {
        name: 'availability_without_slots',
        matches: (s) => s.intent === Intent.CHECK_AVAILABILITY,
        render: () => "I don't see any available slots for your preferred time. " +
            'Could you suggest an alternative time or date?'
    },
    {
        name: 'awaiting_date',
        matches: (s) => s.intent === Intent.BOOK_APPOINTMENT && !s.extractedInfo.preferredDate,
        render: () => "I'd be happy to help you schedule an appointment! When would you like to meet? " +
            'Please let me know your preferred date and time.'
    },
    {
        name: 'checking_availability',
        matches: (s) => s.intent === Intent.BOOK_APPOINTMENT,
        render: () => 'Let me check availability for your requested time...'
    },
];

export const GREETING = "Hello! I'm here to help you schedule appointments. When would you like to book a meeting? " +
    "You can say something like 'I want to schedule a call for tomorrow afternoon' or " +
    "'Do you have any free time this Friday?'";

export function composeResponse(state: ConversationState): string {
    const template = RESPONSE_TEMPLATES.find(t => t.matches(state));
    return template ? template.render(state) : GREETING;
}
