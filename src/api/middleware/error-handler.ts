import { Request, Response, NextFunction } from 'express';
import { logger } from '../../shared/logger';
import { BaseError } from '../../shared/errors/base.error';
import { UpstreamUnavailableError } from '../../shared/errors/upstream-unavailable.error';
import { getRequestId } from './request-id.middleware';

interface ErrorResponse {
    success: false;
    error: {
        code: string;
        message: string;
        details?: unknown;
        requestId?: string;
    };
}

const UPSTREAM_RETRY_AFTER_SECONDS = 1;

export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const requestId = getRequestId(req);

    // Handle known errors
    if (err instanceof BaseError) {
        if (err.isServerError) {
            logger.error(`[${requestId}] ${err.code}: ${err.message}`, { path: req.path, method: req.method });
        } else {
            logger.debug(`[${requestId}] ${err.code}: ${err.message}`, { path: req.path, method: req.method });
        }

        const response: ErrorResponse = {
            success: false,
            error: {
                code: err.code,
                message: err.message,
                requestId,
            },
        };

        if (err.details) {
            response.error.details = err.details;
        }

        if (err instanceof UpstreamUnavailableError) {
            res.setHeader('Retry-After', String(UPSTREAM_RETRY_AFTER_SECONDS));
        }

        res.status(err.statusCode).json(response);
        return;
    }

    logger.error(`[${requestId}] Error:`, {
        message: err.message,
        stack: err.stack,
        path: req.path,
        method: req.method,
    });

    // Handle unknown errors
    const response: ErrorResponse = {
        success: false,
        error: {
            code: 'INTERNAL_SERVER_ERROR',
            message: process.env.NODE_ENV === 'production'
                ? 'An unexpected error occurred'
                : err.message,
            requestId,
        },
    };

    res.status(500).json(response);
}

export default errorHandler;
