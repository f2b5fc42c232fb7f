// src/infrastructure/webserver/server.ts
import express, { Application, NextFunction, Request, Response } from 'express';
import http from 'http';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../logger';
import { errorHandler } from './middleware/error.middleware';
import { createPriceListRouter } from './routes/price-list.routes';

@singleton()
@injectable()
export class Server {
    private app: Application;
    private httpServer?: http.Server;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('Initializing Express server...');
        this.app = express();
        this.setupMiddleware();
        this.setupRoutes();
        this.setupErrorHandling();
        this.logger.info('Express server initialized.');
    }

    private setupMiddleware(): void {
        this.app.use(express.json({ limit: '1mb' }));
        this.app.use(express.urlencoded({ extended: true, limit: '1mb' }));

        this.app.use((req: Request, res: Response, next: NextFunction) => {
            this.logger.http(`Request: ${req.method} ${req.originalUrl}`, { ip: req.ip });
            next();
        });

        this.logger.info('Standard middleware configured.');
    }

    private setupRoutes(): void {
        // Liveness only; sessions and the mapping store are not probed
        this.app.get('/health', (req: Request, res: Response) => {
            res.status(200).json({ status: 'UP', timestamp: new Date().toISOString() });
        });

        this.app.use('/api/price-lists', createPriceListRouter());

        this.app.use('/api', (req: Request, res: Response) => {
            res.status(404).json({ message: `API route not found: ${req.method} ${req.originalUrl}` });
        });

        this.logger.info('API routes configured.');
    }

    private setupErrorHandling(): void {
        // Multer and zod failures from the price list routes end up here too
        this.app.use(errorHandler);

        this.logger.info('Error handling middleware configured.');
    }

    public start(port: number): Promise<void> {
         return new Promise((resolve, reject) => {
            this.httpServer = this.app.listen(port, () => {
                this.logger.info(`Server started and listening on http://localhost:${port}`);
                resolve();
            })
            .on('error', (error) => {
                this.logger.error('Failed to start server:', error);
                reject(error);
            });
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.httpServer) {
                this.logger.info('Attempting to gracefully stop the server...');
                this.httpServer.close((error) => {
                    if (error) {
                        this.logger.error('Error stopping server:', error);
                        return reject(error);
                    }
                    this.logger.info('Server stopped successfully.');
                    resolve();
                });
            } else {
                this.logger.warn('Server was not running.');
                resolve();
            }
        });
    }
}