// src/core/domain/repositories/collaborators.ts
// Ports onto the general ledger and bank account master data, which this engine consumes but does not own.
import { Money } from '../value-objects/money.vo';
import { IsoDate } from '../../../shared/types/common.types';

export interface BalanceOracle {
    /** Ledger balance of a GL account (debits minus credits) as of the end of `asOf`. */
    getAccountBalance(glAccountId: string, asOf: IsoDate, currency: string): Promise<Money>;
}

export interface BankAccountInfo {
    id: string;
    name: string;
    glAccountId: string;
    currencyCode: string;
    isActive: boolean;
    lastReconciledDate: IsoDate | null;
    lastReconciledBalance: Money | null;
}

export interface BankAccountDirectory {
    getById(bankAccountId: string): Promise<BankAccountInfo | null>;
    recordReconciled(bankAccountId: string, statementDate: IsoDate, statementEndingBalance: Money): Promise<void>;
}

export interface JournalLine {
    glAccountId: string;
    debit: Money;
    credit: Money;
    description: string;
}

export interface JournalEntryOptions {
    actorId: string;
    reference?: string | null;
}

export interface JournalEntryFactory {
    /** Creates and posts a balanced journal entry, resolving its id. */
    createAndPost(lines: JournalLine[], date: IsoDate, description: string, options: JournalEntryOptions): Promise<string>;
}
