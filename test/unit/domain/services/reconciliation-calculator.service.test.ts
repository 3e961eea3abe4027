// test/unit/domain/services/reconciliation-calculator.service.test.ts
import {
    BankTransactionEntity,
    BankTransactionType
} from '@/core/domain/entities/bank-transaction.entity';
import {
    calculateReconciliation,
    summaryToJSON
} from '@/core/domain/services/reconciliation-calculator.service';
import { Money } from '@/core/domain/value-objects/money.vo';

let sequence = 0;

function tx(amount: number, isFromStatement: boolean, currency = 'USD'): BankTransactionEntity {
    sequence += 1;
    const createdAt = new Date('2024-01-05T00:00:00.000Z');
    return new BankTransactionEntity({
        id: `tx-${sequence}`,
        bankAccountId: 'bank-acc-1',
        transactionDate: '2024-01-05',
        amount: Money.of(amount, currency),
        description: 'line',
        reference: null,
        transactionType: amount >= 0 ? BankTransactionType.DEPOSIT : BankTransactionType.WITHDRAWAL,
        isFromStatement,
        isReconciled: false,
        reconciledDate: null,
        reconciliationId: null,
        journalEntryId: null,
        createdBy: 'seed',
        createdAt,
        updatedAt: createdAt
    });
}

const tolerance = Money.of(0.01);

describe('calculateReconciliation', () => {
    it('balances when there is nothing left to reconcile and the balances agree', () => {
        const summary = calculateReconciliation({
            glBalance: Money.of(1000),
            statementEndingBalance: Money.of(1000),
            statementItems: [],
            systemItems: [],
            tolerance
        });

        expect(summary.difference.amount).toBe(0);
        expect(summary.isBalanced).toBe(true);
    });

    it('adjusts the book side with statement-only items and the bank side with system-only items', () => {
        const summary = calculateReconciliation({
            glBalance: Money.of(5000),
            statementEndingBalance: Money.of(4800),
            statementItems: [tx(2.5, true), tx(-15, true)],
            systemItems: [tx(300, false), tx(-487.5, false)],
            tolerance
        });

        expect(summary.interestNotInBook.amount).toBe(2.5);
        expect(summary.chargesNotInBook.amount).toBe(15);
        expect(summary.depositsInTransit.amount).toBe(300);
        expect(summary.outstandingWithdrawals.amount).toBe(487.5);
        // 5000 + 2.50 - 15
        expect(summary.adjustedBookBalance.amount).toBe(4987.5);
        // 4800 + 300 - 487.50
        expect(summary.adjustedBankBalance.amount).toBe(4612.5);
        expect(summary.difference.amount).toBe(-375);
        expect(summary.isBalanced).toBe(false);
        expect(summary.unreconciledStatementCount).toBe(2);
        expect(summary.unreconciledSystemCount).toBe(2);
    });

    it('leaves reconciled items out of every figure', () => {
        const claimed = tx(100, false);
        claimed.claim('rec-1', '2024-01-31');

        const summary = calculateReconciliation({
            glBalance: Money.of(100),
            statementEndingBalance: Money.of(100),
            statementItems: [],
            systemItems: [claimed],
            tolerance
        });

        expect(summary.depositsInTransit.isZero()).toBe(true);
        expect(summary.unreconciledSystemCount).toBe(0);
        expect(summary.isBalanced).toBe(true);
    });

    it('treats a one-cent difference as unbalanced', () => {
        const summary = calculateReconciliation({
            glBalance: Money.of(100),
            statementEndingBalance: Money.of(100.01),
            statementItems: [],
            systemItems: [],
            tolerance
        });

        expect(summary.difference.amountInCents).toBe(1);
        expect(summary.isBalanced).toBe(false);
    });

    it('ignores zero-amount items in both directions', () => {
        const summary = calculateReconciliation({
            glBalance: Money.of(50),
            statementEndingBalance: Money.of(50),
            statementItems: [tx(0, true)],
            systemItems: [],
            tolerance
        });

        expect(summary.interestNotInBook.isZero()).toBe(true);
        expect(summary.chargesNotInBook.isZero()).toBe(true);
        expect(summary.unreconciledStatementCount).toBe(1);
    });
});

describe('summaryToJSON', () => {
    it('flattens money into numbers with one currency field', () => {
        const summary = calculateReconciliation({
            glBalance: Money.of(10, 'EUR'),
            statementEndingBalance: Money.of(12, 'EUR'),
            statementItems: [tx(2, true, 'EUR')],
            systemItems: [],
            tolerance: Money.of(0.01, 'EUR')
        });

        expect(summaryToJSON(summary)).toEqual({
            glBalance: 10,
            statementEndingBalance: 12,
            interestNotInBook: 2,
            chargesNotInBook: 0,
            depositsInTransit: 0,
            outstandingWithdrawals: 0,
            adjustedBookBalance: 12,
            adjustedBankBalance: 12,
            difference: 0,
            isBalanced: true,
            tolerance: 0.01,
            currency: 'EUR',
            unreconciledStatementCount: 1,
            unreconciledSystemCount: 0
        });
    });
});
