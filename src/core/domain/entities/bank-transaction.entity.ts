// src/core/domain/entities/bank-transaction.entity.ts
import { Money } from '../value-objects/money.vo';
import { IsoDate } from '../../../shared/types/common.types';

export enum BankTransactionType {
    DEPOSIT = 'Deposit',
    WITHDRAWAL = 'Withdrawal',
    INTEREST = 'Interest',
    FEE = 'Fee',
    TRANSFER = 'Transfer',
    ADJUSTMENT = 'Adjustment'
}

/**
 * Required sign of `amount` per type. `0` means either direction is allowed.
 */
export const TRANSACTION_TYPE_SIGN: Readonly<Record<BankTransactionType, 1 | -1 | 0>> = {
    [BankTransactionType.DEPOSIT]: 1,
    [BankTransactionType.INTEREST]: 1,
    [BankTransactionType.WITHDRAWAL]: -1,
    [BankTransactionType.FEE]: -1,
    [BankTransactionType.TRANSFER]: 0,
    [BankTransactionType.ADJUSTMENT]: 0
};

export function signMatchesType(type: BankTransactionType, amount: Money): boolean {
    const sign = TRANSACTION_TYPE_SIGN[type];
    if (amount.isZero()) return false;
    if (sign === 0) return true;
    return sign > 0 ? amount.isPositive() : amount.isNegative();
}

/**
 * Type to record for an amount whose direction is known but whose nature is not.
 */
export function typeForStatementAmount(amount: Money): BankTransactionType {
    return amount.isPositive() ? BankTransactionType.INTEREST : BankTransactionType.FEE;
}

export interface BankTransactionProps {
    id: string;
    bankAccountId: string;
    transactionDate: IsoDate;
    amount: Money;
    description: string;
    reference: string | null;
    transactionType: BankTransactionType;
    isFromStatement: boolean;
    isReconciled: boolean;
    reconciledDate: IsoDate | null;
    reconciliationId: string | null;
    journalEntryId: string | null;
    createdBy: string;
    createdAt: Date;
    updatedAt: Date;
}

export class BankTransactionEntity {
    private readonly props: BankTransactionProps;

    constructor(props: BankTransactionProps) {
        this.props = { ...props };
        this.validate();
    }

    get id(): string { return this.props.id; }
    get bankAccountId(): string { return this.props.bankAccountId; }
    get transactionDate(): IsoDate { return this.props.transactionDate; }
    get amount(): Money { return this.props.amount; }
    get description(): string { return this.props.description; }
    get reference(): string | null { return this.props.reference; }
    get transactionType(): BankTransactionType { return this.props.transactionType; }
    get isFromStatement(): boolean { return this.props.isFromStatement; }
    get isReconciled(): boolean { return this.props.isReconciled; }
    get reconciledDate(): IsoDate | null { return this.props.reconciledDate; }
    get reconciliationId(): string | null { return this.props.reconciliationId; }
    get journalEntryId(): string | null { return this.props.journalEntryId; }
    get createdBy(): string { return this.props.createdBy; }
    get createdAt(): Date { return this.props.createdAt; }
    get updatedAt(): Date { return this.props.updatedAt; }

    /**
     * Claims the transaction for a draft reconciliation.
     */
    claim(reconciliationId: string, statementDate: IsoDate): void {
        if (this.props.isReconciled) {
            throw new Error(`Bank transaction ${this.props.id} is already reconciled`);
        }

        this.props.isReconciled = true;
        this.props.reconciliationId = reconciliationId;
        this.props.reconciledDate = statementDate;
        this.props.updatedAt = new Date();
    }

    /**
     * Returns the transaction to the unreconciled pool.
     */
    release(): void {
        if (!this.props.isReconciled) {
            throw new Error(`Bank transaction ${this.props.id} is not reconciled`);
        }

        this.props.isReconciled = false;
        this.props.reconciliationId = null;
        this.props.reconciledDate = null;
        this.props.updatedAt = new Date();
    }

    private validate(): void {
        if (!this.props.id) {
            throw new Error('Bank transaction id is required');
        }

        if (this.props.isReconciled !== (this.props.reconciliationId !== null)) {
            throw new Error(`Bank transaction ${this.props.id}: is_reconciled and reconciliation_id disagree`);
        }
    }

    toJSON(): Omit<BankTransactionProps, 'amount' | 'createdAt' | 'updatedAt'> & {
        amount: number;
        currency: string;
        createdAt: string;
        updatedAt: string;
    } {
        return {
            ...this.props,
            amount: this.props.amount.amount,
            currency: this.props.amount.currency,
            createdAt: this.props.createdAt.toISOString(),
            updatedAt: this.props.updatedAt.toISOString()
        };
    }
}
