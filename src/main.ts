// src/main.ts

import 'reflect-metadata';
import config from './config';
import { registerDependencies } from './register';

// === REGISTER DEPENDENCIES IMMEDIATELY ===
registerDependencies();
// ==========================================

import { container } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from './infrastructure/logger';
import { Server } from './infrastructure/webserver/server';
import { AppDataSource } from './infrastructure/database/providers/data-source.provider';

async function bootstrap(): Promise<void> {
    // Resolve logger *after* registration
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    try {
        logger.info(`Application starting in ${config.nodeEnv} mode...`);
        logger.info(`Using port: ${config.port}`);
        logger.info(`Log level set to: ${config.logLevel}`);

        logger.info(`Mapping store: ${config.mapping.store}, key fields: ${config.reconciliation.keyFields.join(' > ')}`);

        // --- STEP 1: Initialize the database (only backs the mapping store) ---
        if (config.mapping.store === 'database') {
            const dataSourceProvider = container.resolve(AppDataSource);
            try {
                logger.info('Initializing database connection...');
                await dataSourceProvider.init();
                logger.info('Database connection initialized successfully.');
            } catch (dbError) {
                logger.error('FATAL: Failed to initialize database connection. Exiting.', { message: dbError instanceof Error ? dbError.message : String(dbError) });
                process.exit(1);
            }
        }
        // --- END STEP 1 ---


        // --- STEP 2: Resolve Main Application Components (Server) ---
        // Controllers and the mapping store resolve here, after the database is up
        logger.info('Resolving main application server...');
        const server = container.resolve(Server);
        logger.info('Server component resolved.');
        // --- END STEP 2 ---


        // --- STEP 3: Start the Server ---
        logger.info('Starting HTTP server...');
        await server.start(config.port);
        logger.info(`Server listening successfully on port ${config.port}`);
        // --- END STEP 3 ---

    } catch (error) {
        if (error instanceof Error) {
            logger.error('Failed to bootstrap application:', { message: error.message, stack: error.stack });
        } else {
            logger.error(`Failed to bootstrap application with unknown error: ${String(error)}`);
        }
        process.exit(1);
    }
}

async function gracefulShutdown(signal: string): Promise<void> {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    logger.warn(`Received ${signal}. Stopping the price list service...`);

    try {
        // Open sessions live in memory only and are lost here
        await container.resolve(Server).stop();
        logger.info('HTTP server stopped; open price list sessions discarded.');

        if (config.mapping.store === 'database') {
            logger.info('Closing the mapping store database connection...');
            await container.resolve(AppDataSource).close();
        }

        logger.info('Price list service stopped.');
        process.exit(0);
    } catch (error) {
        logger.error('Error while stopping the price list service:', { message: error instanceof Error ? error.message : String(error) });
        process.exit(1);
    }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

void bootstrap();
