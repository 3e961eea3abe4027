// src/core/application/services/reconciliation-summary.service.ts
import { ReconciliationEntity } from '../../domain/entities/reconciliation.entity';
import { BankAccountInfo } from '../../domain/repositories/collaborators';
import { ReconciliationStores } from '../../domain/repositories/unit-of-work';
import { calculateReconciliation, ReconciliationSummary } from '../../domain/services/reconciliation-calculator.service';
import { Money } from '../../domain/value-objects/money.vo';
import { NotFoundException } from '../../../shared/exceptions/not-found.exception';
import { TransactionPools, TransactionPoolService } from './transaction-pool.service';

export interface ReconciliationSettings {
    /** Largest difference, in currency units, still treated as zero. */
    tolerance: number;
    historyMaxPageSize: number;
}

export interface SummaryWithPools {
    summary: ReconciliationSummary;
    pools: TransactionPools;
}

/**
 * Feeds the calculator from the store. Nothing is cached between calls.
 */
export class ReconciliationSummaryService {
    constructor(
        private readonly poolService: TransactionPoolService,
        private readonly settings: ReconciliationSettings
    ) {}

    tolerance(currency: string): Money {
        return Money.of(this.settings.tolerance, currency);
    }

    async requireBankAccount(stores: ReconciliationStores, bankAccountId: string): Promise<BankAccountInfo> {
        const account = await stores.bankAccounts.getById(bankAccountId);
        if (!account) {
            throw new NotFoundException('BankAccount', bankAccountId);
        }
        return account;
    }

    async summarize(
        stores: ReconciliationStores,
        reconciliation: ReconciliationEntity,
        statementEndingBalance: Money = reconciliation.statementEndingBalance
    ): Promise<SummaryWithPools> {
        const account = await this.requireBankAccount(stores, reconciliation.bankAccountId);

        const [glBalance, pools] = await Promise.all([
            stores.balances.getAccountBalance(account.glAccountId, reconciliation.statementDate, account.currencyCode),
            this.poolService.getUnreconciled(stores, reconciliation.bankAccountId, reconciliation.statementDate)
        ]);

        const summary = calculateReconciliation({
            glBalance,
            statementEndingBalance,
            statementItems: pools.statementItems,
            systemItems: pools.systemItems,
            tolerance: this.tolerance(statementEndingBalance.currency)
        });

        return { summary, pools };
    }
}
