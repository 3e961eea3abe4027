// src/core/domain/services/reconciliation-calculator.service.ts
import { Money } from '../value-objects/money.vo';
import { BankTransactionEntity } from '../entities/bank-transaction.entity';

export interface ReconciliationInputs {
    glBalance: Money;
    statementEndingBalance: Money;
    /** Unreconciled statement-sourced transactions as of the statement date. */
    statementItems: BankTransactionEntity[];
    /** Unreconciled system-sourced transactions as of the statement date. */
    systemItems: BankTransactionEntity[];
    tolerance: Money;
}

export interface ReconciliationSummary {
    glBalance: Money;
    statementEndingBalance: Money;
    interestNotInBook: Money;
    chargesNotInBook: Money;
    depositsInTransit: Money;
    outstandingWithdrawals: Money;
    adjustedBookBalance: Money;
    adjustedBankBalance: Money;
    difference: Money;
    isBalanced: boolean;
    tolerance: Money;
    unreconciledStatementCount: number;
    unreconciledSystemCount: number;
}

interface SignSplit {
    inflows: Money;
    outflows: Money;
}

function splitBySign(items: BankTransactionEntity[], currency: string): SignSplit {
    let inflows = Money.zero(currency);
    let outflows = Money.zero(currency);

    for (const item of items) {
        if (item.isReconciled) continue;

        if (item.amount.isPositive()) {
            inflows = inflows.add(item.amount);
        } else if (item.amount.isNegative()) {
            outflows = outflows.add(item.amount.abs());
        }
    }

    return { inflows, outflows };
}

/**
 * Adjusted book balance = GL + statement credits not in book - statement charges not in book.
 * Adjusted bank balance = statement balance + deposits in transit - outstanding withdrawals.
 * Pure; callers refetch the pools before every call.
 */
export function calculateReconciliation(inputs: ReconciliationInputs): ReconciliationSummary {
    const currency = inputs.statementEndingBalance.currency;

    const statementSide = splitBySign(inputs.statementItems, currency);
    const systemSide = splitBySign(inputs.systemItems, currency);

    const adjustedBookBalance = inputs.glBalance
        .add(statementSide.inflows)
        .subtract(statementSide.outflows);

    const adjustedBankBalance = inputs.statementEndingBalance
        .add(systemSide.inflows)
        .subtract(systemSide.outflows);

    const difference = adjustedBankBalance.subtract(adjustedBookBalance);

    return {
        glBalance: inputs.glBalance,
        statementEndingBalance: inputs.statementEndingBalance,
        interestNotInBook: statementSide.inflows,
        chargesNotInBook: statementSide.outflows,
        depositsInTransit: systemSide.inflows,
        outstandingWithdrawals: systemSide.outflows,
        adjustedBookBalance,
        adjustedBankBalance,
        difference,
        isBalanced: difference.isBelow(inputs.tolerance),
        tolerance: inputs.tolerance,
        unreconciledStatementCount: inputs.statementItems.filter(item => !item.isReconciled).length,
        unreconciledSystemCount: inputs.systemItems.filter(item => !item.isReconciled).length
    };
}

export function summaryToJSON(summary: ReconciliationSummary) {
    return {
        glBalance: summary.glBalance.amount,
        statementEndingBalance: summary.statementEndingBalance.amount,
        interestNotInBook: summary.interestNotInBook.amount,
        chargesNotInBook: summary.chargesNotInBook.amount,
        depositsInTransit: summary.depositsInTransit.amount,
        outstandingWithdrawals: summary.outstandingWithdrawals.amount,
        adjustedBookBalance: summary.adjustedBookBalance.amount,
        adjustedBankBalance: summary.adjustedBankBalance.amount,
        difference: summary.difference.amount,
        isBalanced: summary.isBalanced,
        tolerance: summary.tolerance.amount,
        currency: summary.statementEndingBalance.currency,
        unreconciledStatementCount: summary.unreconciledStatementCount,
        unreconciledSystemCount: summary.unreconciledSystemCount
    };
}
