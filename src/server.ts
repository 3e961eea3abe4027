// src/server.ts
import dotenv from 'dotenv';

dotenv.config();

import { Pool } from 'pg';
import { App } from './app';
import { ConfigService } from './config/environment';
import { eventDispatcher } from './core/application/handlers/event-dispatcher.service';
import { EventHandlerRegistry } from './core/application/services/event-handler-registry.service';
import { BankReconciliationApplicationService } from './core/application/services/bank-reconciliation.application.service';
import { connectPostgreSQL, disconnectPostgreSQL } from './infrastructure/database/connections';
import { PostgresUnitOfWorkFactory } from './infrastructure/database/postgres/postgres-unit-of-work.factory';
import { applySchema } from './infrastructure/database/postgres/schema';
import { logger } from './infrastructure/monitoring/logger.service';

/**
 * Wires the store, the engine and the HTTP layer, and shuts them down in reverse order.
 */
class Server {
    private readonly config = ConfigService.getInstance();
    private pool: Pool | null = null;
    private app: App | null = null;
    private shutdownInProgress = false;

    constructor() {
        this.setupShutdownHandlers();
    }

    async start(): Promise<void> {
        try {
            const env = this.config.getAll();

            logger.info('Starting bank reconciliation engine', {
                nodeVersion: process.version,
                environment: env.NODE_ENV,
                tolerance: env.RECONCILIATION_TOLERANCE
            });

            const pool = await connectPostgreSQL(env);
            this.pool = pool;
            await applySchema(pool);

            EventHandlerRegistry.initialize(eventDispatcher);

            const reconciliationService = new BankReconciliationApplicationService(
                new PostgresUnitOfWorkFactory(pool, eventDispatcher),
                {
                    tolerance: env.RECONCILIATION_TOLERANCE,
                    historyMaxPageSize: env.HISTORY_MAX_PAGE_SIZE
                }
            );

            this.app = new App(
                {
                    reconciliationService,
                    checkDatabase: () => this.checkDatabase(pool)
                },
                { environment: env.NODE_ENV }
            );

            await this.app.initialize();
            await this.app.listen(env.HOST, env.PORT);
        } catch (error) {
            logger.fatal('Failed to start server', error instanceof Error ? error : undefined);
            await this.gracefulShutdown();
            process.exit(1);
        }
    }

    private async checkDatabase(pool: Pool): Promise<boolean> {
        try {
            await pool.query('SELECT 1');
            return true;
        } catch (error) {
            logger.warn('Database health check failed', {
                error: error instanceof Error ? error.message : String(error)
            });
            return false;
        }
    }

    private setupShutdownHandlers(): void {
        process.on('SIGTERM', () => this.handleShutdownSignal('SIGTERM'));
        process.on('SIGINT', () => this.handleShutdownSignal('SIGINT'));

        process.on('uncaughtException', (error: Error) => {
            logger.fatal('Uncaught exception - shutting down', error);
            this.handleShutdownSignal('uncaughtException', 1);
        });

        process.on('unhandledRejection', (reason: unknown) => {
            logger.fatal('Unhandled promise rejection - shutting down', reason instanceof Error ? reason : undefined);
            this.handleShutdownSignal('unhandledRejection', 1);
        });
    }

    private handleShutdownSignal(signal: string, exitCode: number = 0): void {
        logger.info('Shutdown signal received', { signal });
        this.gracefulShutdown()
            .then(() => process.exit(exitCode))
            .catch((error: unknown) => {
                logger.fatal('Graceful shutdown failed', error instanceof Error ? error : undefined);
                process.exit(1);
            });
    }

    private async gracefulShutdown(): Promise<void> {
        if (this.shutdownInProgress) {
            return;
        }
        this.shutdownInProgress = true;

        if (this.app) {
            await this.app.close();
        }
        if (this.pool) {
            await disconnectPostgreSQL(this.pool);
        }
        logger.flush();
    }
}

new Server().start().catch((error: unknown) => {
    logger.fatal('Server crashed during startup', error instanceof Error ? error : undefined);
    process.exit(1);
});
