// src/core/domain/repositories/reconciliation.repository.ts
import { ReconciliationEntity } from '../entities/reconciliation.entity';
import { IsoDate, PaginationOptions } from '../../../shared/types/common.types';
import { LockOptions } from './bank-transaction.repository';

export interface ReconciliationPage {
    items: ReconciliationEntity[];
    total: number;
}

export interface ReconciliationRepository {
    findById(id: string, options?: LockOptions): Promise<ReconciliationEntity | null>;
    findOpenDraft(bankAccountId: string, statementDate: IsoDate, options?: LockOptions): Promise<ReconciliationEntity | null>;
    /**
     * Inserts a new draft. Resolves `false` when another draft for the same
     * account and statement date already exists.
     */
    insertDraft(draft: ReconciliationEntity): Promise<boolean>;
    save(reconciliation: ReconciliationEntity): Promise<void>;
    /** Finalized reconciliations only, newest statement date first. */
    findFinalizedByBankAccount(bankAccountId: string, pagination: PaginationOptions): Promise<ReconciliationPage>;
}
