// src/middleware/error-handler.ts

import type { NextFunction, Request, Response } from 'express';
import type { Logger } from '../services/base/types';
import { AppError, errorMessage } from '../errors';

/** Last line of defence: anything a route did not handle becomes a short JSON error. */
export function createErrorHandler(logger: Logger) {
    return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
        const status = error instanceof AppError ? error.status : statusFromBodyParser(error);
        logger.error('Unhandled request error', { method: req.method, path: req.path, status, error: errorMessage(error) });

        if (res.headersSent) {
            res.end();
            return;
        }
        res.status(status).json({ error: error instanceof AppError ? error.userMessage : messageFor(status) });
    };
}

// express.json() marks rejected bodies with a 4xx `status`; 413 means the body exceeded the limit
function statusFromBodyParser(error: unknown): number {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        if (error.status === 413) return 413;
        return error.status >= 400 && error.status < 500 ? 400 : 500;
    }
    return 500;
}

function messageFor(status: number): string {
    switch (status) {
        case 400:
            return 'Malformed request body';
        case 413:
            return 'Request body too large';
        default:
            return 'Internal server error';
    }
}
