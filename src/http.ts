import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import {
    AuthenticationError,
    ConflictError,
    GeneratorUnavailableError,
    InsufficientFundsError,
    NotFoundError,
    RateLimitError,
    UnknownUpgradeError,
    ValidationError,
} from './errors';

/**
 * Extracts the token from an `Authorization: Bearer <token>` header.
 */
export function getBearerToken(req: Request): string | undefined {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) return undefined;
    const token = header.slice('Bearer '.length).trim();
    return token.length > 0 ? token : undefined;
}

export function sendError(res: Response, status: number, code: string, message: string, details?: Record<string, unknown>) {
    res.status(status).json({ error: code, message, ...details });
}

/**
 * Maps a failure thrown by a service onto its HTTP response.
 * Anything unrecognised is logged and reported as a 500.
 */
export function handleRouteError(res: Response, error: unknown) {
    if (error instanceof AuthenticationError) {
        return sendError(res, 401, error.code, error.message);
    }
    if (error instanceof RateLimitError) {
        return sendError(res, 400, error.code, error.message, {
            clickCount: error.clickCount,
            maxClicks: error.maxClicks,
            secondsPassed: error.secondsPassed,
        });
    }
    if (error instanceof InsufficientFundsError) {
        return sendError(res, 400, error.code, error.message, {
            upgradeId: error.upgradeId,
            cost: error.cost,
            score: error.score,
        });
    }
    if (error instanceof UnknownUpgradeError) {
        return sendError(res, 400, error.code, error.message, { upgradeId: error.upgradeId });
    }
    if (error instanceof ValidationError) {
        return sendError(res, 400, error.code, error.message, error.details === undefined ? undefined : { details: error.details });
    }
    if (error instanceof NotFoundError) {
        return sendError(res, 404, error.code, error.message);
    }
    if (error instanceof ConflictError) {
        return sendError(res, 409, error.code, error.message);
    }
    if (error instanceof GeneratorUnavailableError) {
        return sendError(res, 503, error.code, error.message);
    }
    console.error('Unhandled route error', error);
    res.status(500).json({ error: 'internal_error' });
}

/**
 * Last-resort handler for errors raised by middleware, such as a request body
 * that is not valid JSON.
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
        return sendError(res, 400, 'InvalidPayload', 'Request body is not valid JSON');
    }
    handleRouteError(res, error);
};
