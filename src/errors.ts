import type { Response } from 'express';

export class HttpError extends Error {
    statusCode: number;

    constructor(message: string, statusCode = 500) {
        super(message);
        this.name = 'HttpError';
        this.statusCode = statusCode;
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

/**
 * Sends the reply for an error thrown inside a route handler.
 * HttpErrors keep their status; anything else is logged and becomes a 500.
 */
export function sendError(res: Response, error: unknown, label: string, nodeEnv: string) {
    if (error instanceof HttpError) {
        return res.status(error.statusCode).json({ error: error.message });
    }

    console.error(`Error in ${label}:`, error);
    res.status(500).json({
        error: 'Internal server error',
        message: errorMessage(error) || 'An unexpected error occurred',
        details: nodeEnv === 'development' && error instanceof Error ? error.stack : undefined,
    });
}
