// src/main.ts

import 'reflect-metadata';
import config, { describeConfig } from './config';
import { registerDependencies } from './register';

import { container } from 'tsyringe';
import { Logger } from 'winston';
import { LedgerService } from './core/ledger';
import { LOGGER_TOKEN } from './infrastructure/logger';
import { Server } from './infrastructure/webserver/server';

async function bootstrap() {
    try {
        // === REGISTER DEPENDENCIES FIRST ===
        registerDependencies();
        const logger = container.resolve<Logger>(LOGGER_TOKEN);

        logger.info(`Application starting in ${config.nodeEnv} mode...`);
        describeConfig().forEach(line => logger.info(line));

        // --- STEP 1: Load the ledger (migrates legacy files on the way) ---
        // A migration the drop guard rejects aborts startup.
        const ledger = container.resolve(LedgerService);
        const loaded = ledger.load();
        logger.info(`Ledger ready with ${loaded.years.length} year(s)${loaded.migrated ? ' after migration' : ''}.`);

        // --- STEP 2: Resolve and start the server ---
        const server = container.resolve(Server);
        await server.start(config.port);
        logger.info(`Server listening successfully on port ${config.port}`);
    } catch (error) {
        // Use logger if available, otherwise console
        const log = container.isRegistered(LOGGER_TOKEN) ? container.resolve<Logger>(LOGGER_TOKEN) : console;
        if (error instanceof Error) {
            log.error('Failed to bootstrap application:', { message: error.message, stack: error.stack });
        } else {
            log.error('Failed to bootstrap application with unknown error:', error);
        }
        process.exit(1);
    }
}

async function gracefulShutdown(signal: string) {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    const server = container.resolve(Server);

    logger.warn(`Received ${signal}. Initiating graceful shutdown...`);

    try {
        // Ledger writes are synchronous, so nothing is pending once the server stops
        await server.stop();
        logger.info('Application shut down gracefully.');
        process.exit(0);
    } catch (error) {
        logger.error('Error during graceful shutdown:', error);
        process.exit(1);
    }
}

// Listen for termination signals
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT')); // Catches Ctrl+C

// Start the application
void bootstrap();
