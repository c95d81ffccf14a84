import type { NextFunction, Request, Response } from 'express';
import { Logger } from '../Logger';
import { RecordingError } from '../errors';

/** An error that already knows the response it should become. */
export class HttpError extends Error {
    constructor(public readonly status: number, public readonly detail: string) {
        super(detail);
        this.name = 'HttpError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export function createErrorHandler(logger: Logger) {
    return (error: Error, req: Request, res: Response, next: NextFunction): void => {
        if (res.headersSent) {
            next(error);
            return;
        }

        if (error instanceof HttpError) {
            res.status(error.status).json({ detail: error.detail });
            return;
        }

        if (error instanceof RecordingError && error.code === 'FILE_NOT_FOUND') {
            res.status(404).json({ detail: 'File not found' });
            return;
        }

        logger.error(`${req.method} ${req.path} failed:`, error);
        res.status(500).json({ detail: 'Internal server error' });
    };
}

/** Passes a rejected handler promise on to `next`. */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction): void => {
        fn(req, res, next).catch(next);
    };
}
