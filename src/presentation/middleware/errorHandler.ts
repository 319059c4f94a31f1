import { Request, Response, NextFunction } from 'express';
import {
    AvatarGenerationError,
    InvalidInputError,
    JobTimeoutError,
} from '../../domain/errors/AvatarGenerationErrors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Unauthorized error (401).
 */
export class UnauthorizedError extends AppError {
    constructor(message: string = 'Unauthorized') {
        super(401, message);
        this.name = 'UnauthorizedError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

/**
 * HTTP status for errors raised outside the presentation layer.
 * Invalid input → 400, timeout → 504, any other generation error → 502.
 * Client errors from express middleware (e.g. malformed JSON) keep their status.
 */
export function statusCodeFor(err: Error): number | null {
    if (err instanceof AppError) {
        return err.statusCode;
    }
    if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
        return err.status;
    }
    if (err instanceof InvalidInputError) {
        return 400;
    }
    if (err instanceof JobTimeoutError) {
        return 504;
    }
    if (err instanceof AvatarGenerationError) {
        return 502;
    }
    return null;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (err instanceof NotFoundError) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    const statusCode = statusCodeFor(err);
    if (statusCode !== null) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
            },
        };
        res.status(statusCode).json(response);
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
