import { Router, Request, Response } from 'express';
import { Slot } from '../../models/conversation-state';
import { ConversationRouter } from '../../services/conversation/router';
import { SessionStore } from '../../services/conversation/session-store';
import { asyncHandler } from '../middleware/error-handler';
import { optionalString, requireString } from '../request-fields';

export interface SlotView {
    start: string;
    end: string;
    date: string;
    time: string;
    duration: string;
}

export function toSlotView(slot: Slot): SlotView {
    return {
        start: slot.start.toISOString(),
        end: slot.end.toISOString(),
        date: slot.label,
        time: slot.timeLabel,
        duration: slot.durationLabel
    };
}

export function createChatRouter(conversations: ConversationRouter, sessions: SessionStore): Router {
    const chatRouter = Router();

    chatRouter.post('/chat', asyncHandler(async (req: Request, res: Response) => {
        const message = requireString(req.body, 'message');
        const sessionId = optionalString(req.body, 'sessionId') ?? 'default';

        const { response, state } = await conversations.advanceConversation(sessionId, message, new Date());

        res.json({
            response,
            sessionId,
            stage: state.stage,
            intent: state.intent,
            extractedInfo: state.extractedInfo,
            availableSlots: state.availableSlots.map(toSlotView),
            bookingConfirmed: state.bookingConfirmed
        });
    }));

    chatRouter.delete('/sessions/:sessionId', (req: Request, res: Response) => {
        const { sessionId } = req.params;
        if (!sessions.delete(sessionId)) {
            return res.status(404).json({ status: 'error', message: `Session ${sessionId} not found` });
        }
        return res.json({ message: `Session ${sessionId} cleared` });
    });

    chatRouter.delete('/sessions', (_req: Request, res: Response) => {
        const count = sessions.clear();
        res.json({ message: `Cleared ${count} sessions` });
    });

    return chatRouter;
}
