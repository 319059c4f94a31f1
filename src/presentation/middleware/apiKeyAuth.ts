import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from './errorHandler';

function keysMatch(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Rejects requests whose key (X-API-Key header, else `key` in the JSON body)
 * does not match the configured one.
 */
export function createApiKeyAuth(expectedKey: string): RequestHandler {
    if (!expectedKey) {
        throw new Error('An API key is required to protect the avatar routes');
    }

    return (req: Request, _res: Response, next: NextFunction) => {
        const body: unknown = req.body;
        const bodyKey = typeof body === 'object' && body !== null && 'key' in body && typeof body.key === 'string'
            ? body.key
            : undefined;
        const provided = req.header('X-API-Key') || bodyKey;

        if (!provided || !keysMatch(provided, expectedKey)) {
            next(new UnauthorizedError('Invalid or missing API key'));
            return;
        }
        next();
    };
}
