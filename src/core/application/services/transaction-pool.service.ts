// src/core/application/services/transaction-pool.service.ts
import { BankTransactionEntity } from '../../domain/entities/bank-transaction.entity';
import { ReconciliationStores } from '../../domain/repositories/unit-of-work';
import { IsoDate } from '../../../shared/types/common.types';

export interface TransactionPools {
    statementItems: BankTransactionEntity[];
    systemItems: BankTransactionEntity[];
}

export function partitionBySource(transactions: BankTransactionEntity[]): TransactionPools {
    return {
        statementItems: transactions.filter(tx => tx.isFromStatement),
        systemItems: transactions.filter(tx => !tx.isFromStatement)
    };
}

/**
 * Read-only access to the statement-sourced and system-sourced pools of an account.
 */
export class TransactionPoolService {
    async getUnreconciled(stores: ReconciliationStores, bankAccountId: string, asOf: IsoDate): Promise<TransactionPools> {
        const transactions = await stores.transactions.findUnreconciled(bankAccountId, asOf);
        return partitionBySource(transactions);
    }

    /**
     * Transactions claimed by one reconciliation, split by source.
     */
    async getItemsForReconciliation(stores: ReconciliationStores, reconciliationId: string): Promise<TransactionPools> {
        const transactions = await stores.transactions.findByReconciliationId(reconciliationId);
        return partitionBySource(transactions);
    }
}
