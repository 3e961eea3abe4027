// src/core/domain/repositories/unit-of-work.ts
import { BankTransactionRepository } from './bank-transaction.repository';
import { ReconciliationRepository } from './reconciliation.repository';
import { BalanceOracle, BankAccountDirectory, JournalEntryFactory } from './collaborators';
import { BaseDomainEvent } from '../events/base-domain.event';

export interface ReconciliationStores {
    reconciliations: ReconciliationRepository;
    transactions: BankTransactionRepository;
    bankAccounts: BankAccountDirectory;
    balances: BalanceOracle;
    journal: JournalEntryFactory;
}

export interface TransactionalContext extends ReconciliationStores {
    /** Queued and dispatched only once the surrounding transaction commits. */
    addDomainEvent(event: BaseDomainEvent): void;
}

export interface IUnitOfWorkFactory {
    /** Runs `work` inside one storage transaction; any throw rolls the whole of it back. */
    execute<T>(work: (context: TransactionalContext) => Promise<T>): Promise<T>;
    /** Runs `work` against the store without a transaction or locks. */
    read<T>(work: (stores: ReconciliationStores) => Promise<T>): Promise<T>;
}
