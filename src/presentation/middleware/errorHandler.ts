import { Request, Response, NextFunction } from 'express';

/**
 * HTTP-facing error carrying its status code.
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

export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

export class UnauthorizedError extends AppError {
    constructor(message: string = 'Unauthorized') {
        super(401, message);
        this.name = 'UnauthorizedError';
    }
}

export interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

function statusFor(err: Error): number {
    return err instanceof AppError ? err.statusCode : 500;
}

/**
 * Catch-all for unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
    next(new NotFoundError(`No route for ${req.method} ${req.path}`));
}

/**
 * Global error handler middleware. Must be registered last.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const status = statusFor(err);

    if (status < 500) {
        console.warn(`[HTTP] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[HTTP] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    const exposeMessage = status < 500 || process.env.NODE_ENV !== 'production';
    const response: ErrorResponse = {
        error: {
            message: exposeMessage ? err.message : 'Internal server error',
            code: status < 500 ? err.name : 'INTERNAL_ERROR',
        },
    };
    res.status(status).json(response);
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
