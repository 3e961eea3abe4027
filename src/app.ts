// src/app.ts
import fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { ReconciliationController } from './api/controllers/reconciliation.controller';
import healthRoutes from './api/routes/health.routes';
import reconciliationRoutes from './api/routes/reconciliation.routes';
import { BankReconciliationApplicationService } from './core/application/services/bank-reconciliation.application.service';
import { logger } from './infrastructure/monitoring/logger.service';
import { HTTP_STATUS } from './shared/constants/status-codes';
import { ERROR_CODES } from './shared/constants/error-codes';
import { BaseException } from './shared/exceptions/base.exception';
import { ApiResponse } from './shared/types/common.types';
import { toFailure } from './shared/types/result.types';

export interface AppConfig {
    apiVersion: string;
    apiPrefix: string;
    environment: string;
    corsOrigin: string[] | boolean;
}

export interface AppDependencies {
    reconciliationService: BankReconciliationApplicationService;
    checkDatabase: () => Promise<boolean>;
}

export class App {
    private readonly fastify: FastifyInstance;
    private readonly config: AppConfig;
    private readonly requestStartTimes = new WeakMap<object, number>();

    constructor(private readonly dependencies: AppDependencies, config?: Partial<AppConfig>) {
        this.config = {
            apiVersion: 'v1',
            apiPrefix: '/api',
            environment: 'development',
            corsOrigin: false,
            ...config
        };

        this.fastify = fastify({
            logger: false,
            trustProxy: true,
            requestTimeout: 30000,
            bodyLimit: 1048576
        });
    }

    async initialize(): Promise<void> {
        try {
            await this.setupPlugins();
            this.setupMiddlewares();
            this.setupErrorHandlers();
            await this.setupRoutes();
            await this.fastify.ready();

            logger.info('Application initialized', {
                apiVersion: this.config.apiVersion,
                environment: this.config.environment
            });
        } catch (error) {
            logger.fatal('Failed to initialize application', error instanceof Error ? error : undefined);
            throw error;
        }
    }

    getInstance(): FastifyInstance {
        return this.fastify;
    }

    async listen(host: string, port: number): Promise<string> {
        const address = await this.fastify.listen({ host, port });
        logger.info('HTTP server listening', { address });
        return address;
    }

    async close(): Promise<void> {
        await this.fastify.close();
    }

    private async setupPlugins(): Promise<void> {
        await this.fastify.register(cors, {
            origin: this.config.corsOrigin,
            credentials: true
        });

        await this.fastify.register(helmet, {
            contentSecurityPolicy: false
        });
    }

    private setupMiddlewares(): void {
        this.fastify.addHook('onRequest', async (request, reply) => {
            this.requestStartTimes.set(request, Date.now());
            reply.header('X-API-Version', this.config.apiVersion);
        });

        this.fastify.addHook('onResponse', async (request, reply) => {
            const startedAt = this.requestStartTimes.get(request) ?? Date.now();
            const duration = Date.now() - startedAt;

            logger.http(`${request.method} ${request.url} - ${reply.statusCode} - ${duration}ms`, {
                requestId: request.id,
                method: request.method,
                url: request.url,
                statusCode: reply.statusCode,
                duration,
                actorId: request.headers['x-actor-id']
            });
        });
    }

    private async setupRoutes(): Promise<void> {
        const versionedPrefix = `${this.config.apiPrefix}/${this.config.apiVersion}`;
        const controller = new ReconciliationController(this.dependencies.reconciliationService);

        await this.fastify.register(healthRoutes, { checkDatabase: this.dependencies.checkDatabase });
        await this.fastify.register(reconciliationRoutes, {
            prefix: `${versionedPrefix}/reconciliations`,
            controller
        });

        this.fastify.setNotFoundHandler((request, reply) => {
            const body: ApiResponse<never> = {
                success: false,
                error: {
                    kind: 'NOT_FOUND',
                    code: 'ENDPOINT_NOT_FOUND',
                    message: `Route ${request.method} ${request.url} not found`,
                    details: {}
                },
                meta: { timestamp: new Date().toISOString() }
            };
            reply.code(HTTP_STATUS.NOT_FOUND).send(body);
        });
    }

    private setupErrorHandlers(): void {
        this.fastify.setErrorHandler((error: FastifyError | BaseException, request, reply) => {
            const meta = { timestamp: new Date().toISOString() };

            if (error instanceof BaseException) {
                const body: ApiResponse<never> = { success: false, error: toFailure(error), meta };
                reply.code(error.statusCode).send(body);
                return;
            }

            // malformed JSON, unsupported media type and similar client errors raised by fastify
            const statusCode = error.statusCode ?? HTTP_STATUS.INTERNAL_ERROR;
            if (statusCode < HTTP_STATUS.INTERNAL_ERROR) {
                const body: ApiResponse<never> = {
                    success: false,
                    error: { kind: 'VALIDATION_ERROR', code: ERROR_CODES.VALIDATION_ERROR, message: error.message, details: {} },
                    meta
                };
                reply.code(statusCode).send(body);
                return;
            }

            logger.error('Unhandled request error', error, {
                requestId: request.id,
                method: request.method,
                url: request.url
            });

            const body: ApiResponse<never> = {
                success: false,
                error: {
                    kind: 'INTERNAL_ERROR',
                    code: 'INTERNAL_SERVER_ERROR',
                    message: 'Internal server error',
                    details: { requestId: request.id }
                },
                meta
            };
            reply.code(HTTP_STATUS.INTERNAL_ERROR).send(body);
        });
    }
}
