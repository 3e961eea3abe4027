// src/core/domain/services/unit-of-work.service.ts
import { PoolClient } from 'pg';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { BaseDomainEvent } from '../events/base-domain.event';
import { EventDispatcher, eventDispatcher } from '../../application/handlers/event-dispatcher.service';

export interface IRepository {
    setConnection(connection: PoolClient): void;
    clearConnection(): void;
}

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

interface IUnitOfWorkContext {
    isActive: boolean;
    isCommitted: boolean;
    isRolledBack: boolean;
}

export class UnitOfWork {
    private context: IUnitOfWorkContext | null = null;
    private readonly repositories: IRepository[] = [];
    private readonly domainEvents: BaseDomainEvent[] = [];
    private readonly eventDispatcher: EventDispatcher;

    constructor(
        private readonly connection: PoolClient,
        eventDispatcherInstance?: EventDispatcher,
        private readonly isolationLevel: IsolationLevel = 'READ COMMITTED'
    ) {
        this.eventDispatcher = eventDispatcherInstance ?? eventDispatcher;
    }

    /**
     * Registers a repository with this unit of work
     */
    registerRepository(repository: IRepository): void {
        this.repositories.push(repository);

        if (this.context?.isActive) {
            repository.setConnection(this.connection);
        }
    }

    /**
     * Begins a new transaction
     */
    async begin(): Promise<void> {
        if (this.context?.isActive) {
            throw new Error('Transaction is already active');
        }

        try {
            await this.connection.query(`BEGIN ISOLATION LEVEL ${this.isolationLevel}`);

            this.context = {
                isActive: true,
                isCommitted: false,
                isRolledBack: false
            };

            this.repositories.forEach(repo => repo.setConnection(this.connection));

            logger.database('Unit of Work transaction started', {
                backendPid: this.connection.processID,
                isolationLevel: this.isolationLevel
            });
        } catch (error) {
            logger.error('Failed to start Unit of Work transaction', error instanceof Error ? error : undefined);
            throw error;
        }
    }

    /**
     * Commits the current transaction, then dispatches the queued domain events
     */
    async commit(): Promise<void> {
        if (!this.context?.isActive) {
            throw new Error('No active transaction to commit');
        }

        try {
            await this.connection.query('COMMIT');
        } catch (error) {
            logger.error('Failed to commit Unit of Work transaction', error instanceof Error ? error : undefined, {
                backendPid: this.connection.processID
            });

            await this.rollback();
            throw error;
        }

        this.context.isCommitted = true;
        this.context.isActive = false;
        this.clearRepositoryConnections();

        const events = [...this.domainEvents];
        this.domainEvents.length = 0;

        logger.database('Unit of Work transaction committed', {
            backendPid: this.connection.processID,
            eventsCount: events.length
        });

        // The transaction is durable at this point; handler failures are contained by the dispatcher
        await this.eventDispatcher.dispatchBatch(events);
    }

    /**
     * Rolls back the current transaction
     */
    async rollback(): Promise<void> {
        if (this.context?.isCommitted) {
            throw new Error('Cannot rollback a committed transaction');
        }

        if (!this.context?.isActive) {
            throw new Error('No active transaction to rollback');
        }

        try {
            await this.connection.query('ROLLBACK');

            this.context.isRolledBack = true;
            this.context.isActive = false;

            logger.database('Unit of Work transaction rolled back', {
                backendPid: this.connection.processID,
                discardedEvents: this.domainEvents.length
            });
        } catch (error) {
            logger.error('Failed to rollback Unit of Work transaction', error instanceof Error ? error : undefined, {
                backendPid: this.connection.processID
            });
            throw error;
        } finally {
            this.domainEvents.length = 0;
            this.clearRepositoryConnections();
        }
    }

    /**
     * Executes a function within a transaction scope
     */
    async execute<T>(operation: () => Promise<T>): Promise<T> {
        await this.begin();

        let result: T;
        try {
            result = await operation();
        } catch (error) {
            await this.rollback();
            throw error;
        }

        await this.commit();
        return result;
    }

    /**
     * Adds a domain event to be published on commit
     */
    addDomainEvent(event: BaseDomainEvent): void {
        if (!this.context?.isActive) {
            throw new Error('Cannot add domain events outside an active transaction');
        }

        this.domainEvents.push(event);
    }

    getDomainEvents(): BaseDomainEvent[] {
        return [...this.domainEvents];
    }

    isActive(): boolean {
        return this.context?.isActive ?? false;
    }

    isCommitted(): boolean {
        return this.context?.isCommitted ?? false;
    }

    isRolledBack(): boolean {
        return this.context?.isRolledBack ?? false;
    }

    private clearRepositoryConnections(): void {
        this.repositories.forEach(repo => repo.clearConnection());
    }
}
