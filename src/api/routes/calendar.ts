import { Router, Request, Response } from 'express';
import { SchedulerService } from '../../services/scheduling/scheduler';
import { asyncHandler, HttpError } from '../middleware/error-handler';
import { logger } from '../../services/logging';
import { optionalPositiveInt, optionalString, queryPositiveInt, requireDate } from '../request-fields';
import { toSlotView } from './chat';

export function createCalendarRouter(scheduler: SchedulerService): Router {
    const calendarRouter = Router();

    calendarRouter.post('/availability', asyncHandler(async (req: Request, res: Response) => {
        const startDate = requireDate(req.body, 'startDate');
        const endDate = requireDate(req.body, 'endDate');
        const durationMinutes = optionalPositiveInt(req.body, 'durationMinutes', 60);

        if (endDate.getTime() <= startDate.getTime()) {
            throw new HttpError(400, 'endDate must be after startDate');
        }

        const { slots, degraded } = await scheduler.checkAvailability(startDate, endDate, durationMinutes);

        res.json({
            availableSlots: slots.map(toSlotView),
            totalSlots: slots.length,
            degraded
        });
    }));

    calendarRouter.post('/book', asyncHandler(async (req: Request, res: Response) => {
        const start = requireDate(req.body, 'startTime');
        const end = requireDate(req.body, 'endTime');
        if (end.getTime() <= start.getTime()) {
            throw new HttpError(400, 'endTime must be after startTime');
        }

        const result = await scheduler.bookAppointment({
            summary: optionalString(req.body, 'summary') ?? 'Appointment',
            description: optionalString(req.body, 'description'),
            attendeeEmail: optionalString(req.body, 'attendeeEmail'),
            start,
            end
        });

        if (!result.ok) {
            throw new HttpError(502, result.error.message);
        }

        res.json({
            success: true,
            eventId: result.value.id,
            eventLink: result.value.htmlLink,
            message: 'Appointment booked successfully'
        });
    }));

    calendarRouter.get('/events', asyncHandler(async (req: Request, res: Response) => {
        const maxResults = queryPositiveInt(req.query, 'max_results', 10, 250);

        const result = await scheduler.upcomingEvents(maxResults);
        if (!result.ok) {
            logger.warn('Upcoming events unavailable', {
                provider: scheduler.providerName,
                reason: result.error.reason,
                error: result.error.message
            });
            return res.json({ events: [], count: 0, message: result.error.message });
        }

        return res.json({ events: result.value, count: result.value.length });
    }));

    return calendarRouter;
}
