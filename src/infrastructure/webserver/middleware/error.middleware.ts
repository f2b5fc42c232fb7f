// src/infrastructure/webserver/middleware/error.middleware.ts
import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { container } from 'tsyringe'; // Import container to resolve logger
import { Logger } from 'winston';
import config from '../../../config';
import { AppError, MissingFieldError } from '../../../core/common/errors';
import { LOGGER_TOKEN } from '../../logger';

interface ErrorResponse {
    message: string;
    missingFields?: readonly string[];
    error?: string;
    stack?: string;
}

/**
 * Status code and JSON body for an error. Only operational application
 * errors expose their message; anything else is reported generically.
 */
export function buildErrorResponse(err: Error): { statusCode: number; body: ErrorResponse } {
    let statusCode = 500;
    let message = 'An unexpected internal server error occurred.';

    if (err instanceof AppError && err.isOperational) {
        statusCode = err.statusCode;
        message = err.message;
    } else if (err instanceof multer.MulterError) {
        statusCode = 400; // Bad Request for upload errors
        message = `File upload error: ${err.message}`;
    }

    const body: ErrorResponse = { message };
    if (err instanceof MissingFieldError) {
        body.missingFields = err.missingFields;
    }

    // Include error details only in non-production environments for debugging
    if (config.nodeEnv !== 'production') {
        body.error = err.message;
        body.stack = err.stack;
    }
    return { statusCode, body };
}

/**
 * Express error handling middleware function.
 * Must be registered AFTER all other routes and middleware.
 */
export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction // next is required even if not used for Express to recognize it as error handler
): void => {
    // Resolve logger instance within the handler
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    const operational = err instanceof AppError && err.isOperational;
    logger.log(operational ? 'warn' : 'error', `[ErrorHandler] ${err.name}: ${err.message}`, {
        error: {
            name: err.name,
            message: err.message,
            stack: operational ? undefined : err.stack,
            ...(err instanceof AppError && {
                statusCode: err.statusCode,
                isOperational: err.isOperational,
            }),
        },
        request: {
            method: req.method,
            url: req.originalUrl,
            ip: req.ip,
        },
    });

    const { statusCode, body } = buildErrorResponse(err);

    // Check if headers were already sent (e.g., by streaming)
    if (res.headersSent) {
        logger.warn('[ErrorHandler] Headers already sent, cannot send error response.');
        return;
    }

    res.status(statusCode).json(body);
};
