// src/infrastructure/database/postgres/postgres-unit-of-work.factory.ts
import { Pool, PoolClient } from 'pg';
import { EventDispatcher, eventDispatcher } from '../../../core/application/handlers/event-dispatcher.service';
import { IUnitOfWorkFactory, ReconciliationStores, TransactionalContext } from '../../../core/domain/repositories/unit-of-work';
import { IsolationLevel, UnitOfWork } from '../../../core/domain/services/unit-of-work.service';
import { DatabaseException } from '../../../shared/exceptions/infrastructure.exception';
import { logger } from '../../monitoring/logger.service';
import { BankAccountRepositoryPostgres } from './repositories/bank-account.repository';
import { BankTransactionRepositoryPostgres } from './repositories/bank-transaction.repository';
import { JournalEntryRepositoryPostgres } from './repositories/journal-entry.repository';
import { LedgerBalanceRepositoryPostgres } from './repositories/ledger-balance.repository';
import { ReconciliationRepositoryPostgres } from './repositories/reconciliation.repository';

interface PostgresStores extends ReconciliationStores {
    reconciliations: ReconciliationRepositoryPostgres;
    transactions: BankTransactionRepositoryPostgres;
    bankAccounts: BankAccountRepositoryPostgres;
    balances: LedgerBalanceRepositoryPostgres;
    journal: JournalEntryRepositoryPostgres;
}

function createStores(): PostgresStores {
    return {
        reconciliations: new ReconciliationRepositoryPostgres(),
        transactions: new BankTransactionRepositoryPostgres(),
        bankAccounts: new BankAccountRepositoryPostgres(),
        balances: new LedgerBalanceRepositoryPostgres(),
        journal: new JournalEntryRepositoryPostgres()
    };
}

function repositoriesOf(stores: PostgresStores) {
    return [stores.reconciliations, stores.transactions, stores.bankAccounts, stores.balances, stores.journal];
}

/**
 * One pooled client per operation. Fresh repository instances each time, so
 * concurrent operations never share a connection.
 */
export class PostgresUnitOfWorkFactory implements IUnitOfWorkFactory {
    constructor(
        private readonly pool: Pool,
        private readonly dispatcher: EventDispatcher = eventDispatcher,
        private readonly isolationLevel: IsolationLevel = 'READ COMMITTED'
    ) {}

    async execute<T>(work: (context: TransactionalContext) => Promise<T>): Promise<T> {
        const client = await this.acquire();
        const stores = createStores();
        const unitOfWork = new UnitOfWork(client, this.dispatcher, this.isolationLevel);
        repositoriesOf(stores).forEach(repository => unitOfWork.registerRepository(repository));

        const context: TransactionalContext = {
            ...stores,
            addDomainEvent: event => unitOfWork.addDomainEvent(event)
        };

        let releaseError: Error | undefined;
        try {
            await this.guard('begin', () => unitOfWork.begin());

            let result: T;
            try {
                result = await work(context);
            } catch (error) {
                await this.guard('rollback', () => unitOfWork.rollback());
                throw error;
            }

            await this.guard('commit', () => unitOfWork.commit());
            return result;
        } catch (error) {
            // a client whose transaction state is unknown must not go back to the pool
            if (error instanceof DatabaseException && unitOfWork.isActive()) {
                releaseError = error;
            }
            throw error;
        } finally {
            client.release(releaseError);
        }
    }

    async read<T>(work: (stores: ReconciliationStores) => Promise<T>): Promise<T> {
        const client = await this.acquire();
        const stores = createStores();
        const repositories = repositoriesOf(stores);
        repositories.forEach(repository => repository.setConnection(client));

        try {
            return await work(stores);
        } finally {
            repositories.forEach(repository => repository.clearConnection());
            client.release();
        }
    }

    private async acquire(): Promise<PoolClient> {
        try {
            return await this.pool.connect();
        } catch (error) {
            logger.error('Failed to acquire PostgreSQL client', error instanceof Error ? error : undefined);
            throw DatabaseException.fromError('connect', error);
        }
    }

    private async guard(operation: string, step: () => Promise<void>): Promise<void> {
        try {
            await step();
        } catch (error) {
            throw DatabaseException.fromError(operation, error);
        }
    }
}
