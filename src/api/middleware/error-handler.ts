import { Request, Response, NextFunction } from 'express';
import { logger } from '../../services/logging';
import { errorDetails } from '../../utils/errors';

export class HttpError extends Error {
    constructor(
        public statusCode: number,
        message: string
    ) {
        super(message);
        Object.setPrototypeOf(this, HttpError.prototype);
    }
}

export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) {
    if (err instanceof HttpError) {
        return res.status(err.statusCode).json({
            status: 'error',
            message: err.message
        });
    }

    // Log unexpected errors
    logger.error('Unexpected error', { method: req.method, path: req.path, ...errorDetails(err) });

    return res.status(500).json({
        status: 'error',
        message: 'Internal server error'
    });
}

export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
