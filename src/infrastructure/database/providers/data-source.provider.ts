// src/infrastructure/database/providers/data-source.provider.ts
import 'reflect-metadata'; // Keep for DI
import { inject, injectable, singleton } from "tsyringe";
import { DataSource, DataSourceOptions } from "typeorm";
import winston from "winston";

import config from "../../../config";
import { SupplierColumnMapping } from "../../../core/common/entities";
import { AppError } from "../../../core/common/errors";
import { LOGGER_TOKEN } from "../../logger";


@singleton()
@injectable()
export class AppDataSource {

    private _dataSource: DataSource | null = null;
    private readonly logger: winston.Logger;

    constructor(@inject(LOGGER_TOKEN) logger: winston.Logger) {
        this.logger = logger;
        this.logger.info('AppDataSource service initialized.');
    }

    async init(): Promise<DataSource> {
        if (this._dataSource && this._dataSource.isInitialized) {
            this.logger.info("AppDataSource: DataSource already initialized.");
            return this._dataSource;
        }

        if (!this._dataSource) {
            this.logger.info("AppDataSource: Creating new DataSource instance.");

            const options: DataSourceOptions = {
                type: config.database.type, // 'mssql'
                host: config.database.host,
                port: config.database.port,
                username: config.database.username,
                password: config.database.password,
                database: config.database.database,
                synchronize: config.database.synchronize,
                logging: config.database.logging,
                entities: [SupplierColumnMapping],
                subscribers: [],
                migrations: [],
                connectionTimeout: 15000,
                extra: { // MSSQL specific options
                    trustServerCertificate: true
                },
                options: {
                    encrypt: false,
                },
            };

            this.logger.info(`AppDataSource: Configuring DataSource for ${config.database.database} on ${config.database.host}:${config.database.port}`);
            if (config.database.logging) {
                this.logger.debug('AppDataSource: Detailed TypeORM options:', { ...options, password: '****' }); // Mask password
            }

            this._dataSource = new DataSource(options);
        }

        try {
            this.logger.info("AppDataSource: Attempting to initialize TypeORM DataSource...");
            await this._dataSource.initialize();
            this.logger.info(`AppDataSource: TypeORM DataSource initialized successfully! [${config.database.database}@${config.database.host}]`);
        } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            this.logger.error("AppDataSource: Error during Data Source initialization", {
                message: error.message,
                stack: error.stack,
                db_host: config.database.host,
                db_name: config.database.database
            });
            this._dataSource = null; // Ensure it's nullified on error
            throw error;
        }

        return this._dataSource;
    }

    async close(): Promise<void> {
        if (this._dataSource && this._dataSource.isInitialized) {
            this.logger.info("AppDataSource: Attempting to close TypeORM DataSource...");
            await this._dataSource.destroy();
            this.logger.info("AppDataSource: TypeORM DataSource has been closed successfully!");
            this._dataSource = null;
        } else {
            this.logger.debug("AppDataSource: Close called but no DataSource is open.");
            this._dataSource = null;
        }
    }

    getDataSource(): DataSource {
        if (!this._dataSource || !this._dataSource.isInitialized) {
            this.logger.error("AppDataSource: getDataSource() called before initialization or after close!");
            throw new AppError('DatabaseError', 'DataSource is not initialized. Ensure AppDataSource.init() was called successfully.', 500, false);
        }
        return this._dataSource;
    }
}
