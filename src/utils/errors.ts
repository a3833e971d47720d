import { Response } from 'express';
import { Logger } from 'winston';

export class AppError extends Error {
    public readonly statusCode: number;
    public readonly code: string;

    constructor(message: string, statusCode: number, code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.code = code;
    }
}

export class ClientInputError extends AppError {
    constructor(message: string) {
        super(message, 400, 'bad_request');
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404, 'not_found');
    }
}

export class MirrorInProgressError extends AppError {
    constructor(title: string) {
        super(`A mirror of "${title}" is already in progress`, 409, 'mirror_in_progress');
    }
}

export class InvalidPlaylistError extends AppError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 422, 'invalid_playlist', options);
    }
}

/** Catalog storage failure. Fatal during startup, 500 during a request. */
export class StoreFault extends AppError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 500, 'store_fault', options);
    }
}

/** Network or filesystem failure while mirroring. */
export class FetchError extends AppError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 502, 'fetch_failed', options);
    }
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

export function sendError(res: Response, error: unknown, logger: Logger): void {
    if (error instanceof AppError) {
        if (error.statusCode >= 500) {
            logger.error(`${error.name}: ${error.message}${error.cause ? ` (${describeError(error.cause)})` : ''}`);
        } else {
            logger.warn(`${error.name}: ${error.message}`);
        }
        res.status(error.statusCode).json({ error: error.code, message: error.message });
        return;
    }

    logger.error(`Unhandled error: ${describeError(error)}`);
    res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
}
