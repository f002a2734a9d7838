// src/infrastructure/logger/index.ts
import 'reflect-metadata';
import { container } from 'tsyringe';
import winston from 'winston';
import config from '../../config';

// --- Define Logger Creation Function ---
const createAppLogger = (): winston.Logger => {
    // Determine log format based on environment
    const logFormat = winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }), // Log stack traces
        config.nodeEnv === 'production'
            ? winston.format.json()
            : winston.format.printf(info => `${info.timestamp} ${info.level}: ${info.message} ${info.stack ? `\n${info.stack}` : ''}`)
    );

    // Define transports
    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: config.nodeEnv === 'development'
                ? winston.format.combine(
                    winston.format.colorize(),
                    logFormat
                )
                : logFormat,
            level: config.logLevel,
            // Jest owns the process in tests; let it see failures itself
            handleExceptions: config.nodeEnv !== 'test',
            handleRejections: config.nodeEnv !== 'test',
        }),
    ];

    const logger = winston.createLogger({
        level: config.logLevel,
        format: logFormat,
        transports: transports,
        exitOnError: false,
    });

    logger.info(`Logger initialized successfully in ${config.nodeEnv} mode (Level: ${config.logLevel}).`);
    return logger;
};


// --- Create Logger Instance ---
const loggerInstance = createAppLogger();


// --- Dependency Injection Registration ---
export const LOGGER_TOKEN = Symbol.for('AppLogger');

container.register(LOGGER_TOKEN, {
    useValue: loggerInstance
});


// --- Export ---
export default loggerInstance; // Export the instance for direct use
