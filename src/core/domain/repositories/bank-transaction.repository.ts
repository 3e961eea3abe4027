// src/core/domain/repositories/bank-transaction.repository.ts
import { BankTransactionEntity } from '../entities/bank-transaction.entity';
import { IsoDate } from '../../../shared/types/common.types';

export interface LockOptions {
    /** Take a row lock (`FOR UPDATE`) for the rest of the enclosing unit of work. */
    forUpdate?: boolean;
}

export interface BankTransactionRepository {
    findByIds(ids: string[], options?: LockOptions): Promise<BankTransactionEntity[]>;
    /** Unreconciled transactions of the account dated on or before `asOf`, oldest first. */
    findUnreconciled(bankAccountId: string, asOf: IsoDate): Promise<BankTransactionEntity[]>;
    findByReconciliationId(reconciliationId: string): Promise<BankTransactionEntity[]>;
    create(transaction: BankTransactionEntity): Promise<BankTransactionEntity>;
    /** Persists `is_reconciled`, `reconciliation_id`, `reconciled_date` and `updated_at`. */
    updateMatchState(transactions: BankTransactionEntity[]): Promise<void>;
}
