import { Request, Response, NextFunction } from 'express';
import {
    GenerationError,
    GenerationFailedError,
    JobNotFoundError,
    NotReadyError,
    ServiceUnavailableError,
    ValidationError,
} from '../../domain/errors';

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
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        details?: unknown;
    };
}

/**
 * HTTP status for a workflow error.
 */
export function statusForGenerationError(err: GenerationError): number {
    if (err instanceof ValidationError) return 400;
    if (err instanceof JobNotFoundError) return 404;
    if (err instanceof NotReadyError) return 409;
    if (err instanceof GenerationFailedError) return 422;
    if (err instanceof ServiceUnavailableError) return 503;
    return 500;
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
    if (err instanceof GenerationError) {
        const statusCode = statusForGenerationError(err);
        if (statusCode < 500 || err instanceof ServiceUnavailableError) {
            console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        } else {
            console.error(`[ERROR] ${err.name}: ${err.message}`);
        }
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.code,
            },
        };
        res.status(statusCode).json(response);
        return;
    }

    if (err instanceof AppError && err.statusCode < 500) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
            },
        };
        res.status(err.statusCode).json(response);
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
