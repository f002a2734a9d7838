// src/infrastructure/webserver/middleware/error.middleware.ts
import { NextFunction, Request, Response } from 'express';
import { MulterError } from 'multer';
import { container } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../../config';
import { AppError } from '../../../core/common/errors';
import { LOGGER_TOKEN } from '../../logger';

export interface ErrorResponseBody {
    message: string;
    error?: string;
    stack?: string;
}

/**
 * Express error handling middleware function.
 * Must be registered AFTER all other routes and middleware.
 */
export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction // Express recognises error handlers by arity
): void => {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    logger.error(`[ErrorHandler] ${err.name}: ${err.message}`, {
        error: {
            name: err.name,
            message: err.message,
            stack: err.stack,
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

    let statusCode = 500;
    let message = 'An unexpected internal server error occurred.';

    if (err instanceof AppError && err.isOperational) {
        statusCode = err.statusCode;
        message = err.message;
    } else if (err instanceof MulterError) {
        statusCode = 400;
        message = `File upload error: ${err.message}`;
    }

    const responseJson: ErrorResponseBody = { message };

    // Details only outside production
    if (config.nodeEnv !== 'production') {
        responseJson.error = err.message;
        responseJson.stack = err.stack;
    }

    if (res.headersSent) {
        logger.warn('[ErrorHandler] Headers already sent, cannot send error response.');
        return;
    }

    res.status(statusCode).json(responseJson);
};
