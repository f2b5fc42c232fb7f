// src/infrastructure/logger/index.ts
import 'reflect-metadata';
import { container } from 'tsyringe';
import winston from 'winston';
import config from '../../config';

const SERVICE_NAME = 'listino-reconciliation';

const createAppLogger = (): winston.Logger => {
    // JSON lines in production; session ids are part of each message
    const logFormat = winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        config.nodeEnv === 'production'
            ? winston.format.json()
            : winston.format.printf(info => `${info.timestamp} [${info.service}] ${info.level}: ${info.message} ${info.stack ? '\n' + info.stack : ''}`)
    );

    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: config.nodeEnv === 'development'
                ? winston.format.combine(
                    winston.format.colorize(),
                    logFormat
                )
                : logFormat,
            level: config.logLevel,
            // Test runs keep their output to the runner's own reporting
            silent: config.nodeEnv === 'test',
            handleExceptions: config.nodeEnv !== 'test',
            handleRejections: config.nodeEnv !== 'test',
        }),
    ];

    const logger = winston.createLogger({
        level: config.logLevel,
        format: logFormat,
        defaultMeta: { service: SERVICE_NAME },
        transports: transports,
        exitOnError: false,
    });

    logger.info(`Logger ready for ${SERVICE_NAME} (${config.nodeEnv}, level ${config.logLevel}).`);
    return logger;
};

const loggerInstance = createAppLogger();

// Every service receives this instance through @inject(LOGGER_TOKEN)
export const LOGGER_TOKEN = Symbol.for('AppLogger');

container.register(LOGGER_TOKEN, {
    useValue: loggerInstance
});

export default loggerInstance;
