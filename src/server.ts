import express, { Express, Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import { config, validateEnvironment } from './config';
import { errorHandler } from './api/middleware/error-handler';
import { createChatRouter } from './api/routes/chat';
import { createCalendarRouter } from './api/routes/calendar';
import { logger } from './services/logging';
import { ConversationRouter } from './services/conversation/router';
import { SessionStore } from './services/conversation/session-store';
import { createCalendarProvider, SchedulerService } from './services/scheduling/scheduler';
import { errorDetails } from './utils/errors';

export interface AppDeps {
    sessions: SessionStore;
    scheduler: SchedulerService;
    conversations: ConversationRouter;
}

export function createDeps(): AppDeps {
    const sessions = new SessionStore();
    const scheduler = new SchedulerService(createCalendarProvider());
    const conversations = new ConversationRouter({ sessions, scheduler });
    return { sessions, scheduler, conversations };
}

export function createApp(deps: AppDeps): Express {
    const app = express();

    app.set('trust proxy', 1);
    app.use(express.json());

    const apiLimiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
    });
    app.use('/api/', apiLimiter);

    // Request logging in development
    if (config.nodeEnv === 'development') {
        app.use((req: Request, _res: Response, next: NextFunction) => {
            logger.info('HTTP Request', { method: req.method, path: req.path, ip: req.ip });
            next();
        });
    }

    app.use('/api', createChatRouter(deps.conversations, deps.sessions));
    app.use('/api', createCalendarRouter(deps.scheduler));

    // Public Health Check (no auth, no secrets)
    app.get('/healthz', (_req: Request, res: Response) => {
        res.setHeader('Cache-Control', 'no-store');
        res.json({
            ok: true,
            service: 'scheduling-assistant',
            version: '1.0.0',
            sessions: deps.sessions.size,
            calendar: deps.scheduler.providerName,
            timestamp: new Date().toISOString(),
        });
    });

    app.use(errorHandler);

    return app;
}

function start() {
    validateEnvironment();
    logger.info(`Starting scheduling assistant in ${config.nodeEnv} mode...`);

    const deps = createDeps();
    const app = createApp(deps);
    const server = app.listen(config.port, () => {
        logger.info(`Server listening on port ${config.port}`, { calendar: deps.scheduler.providerName });
    });

    const shutdown = (signal: string) => {
        logger.info(`${signal} received, shutting down`);
        deps.sessions.clear();
        server.close(() => {
            logger.close();
            process.exit(0);
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
    try {
        start();
    } catch (error) {
        logger.error('Failed to start server', errorDetails(error));
        process.exit(1);
    }
}
