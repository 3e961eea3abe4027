// src/core/domain/entities/reconciliation.entity.ts
import { Money } from '../value-objects/money.vo';
import { IsoDate } from '../../../shared/types/common.types';
import { AlreadyFinalizedException } from '../../../shared/exceptions/business.exception';
import { BaseDomainEvent } from '../events/base-domain.event';
import { ReconciliationFinalizedEvent } from '../events/reconciliation-events';

export enum ReconciliationStatus {
    DRAFT = 'Draft',
    FINALIZED = 'Finalized'
}

export interface ReconciliationProps {
    id: string;
    bankAccountId: string;
    statementDate: IsoDate;
    statementEndingBalance: Money;
    calculatedBookBalance: Money | null;
    difference: Money | null;
    status: ReconciliationStatus;
    notes: string | null;
    createdBy: string;
    createdAt: Date;
    updatedAt: Date;
    finalizedAt: Date | null;
}

export class ReconciliationEntity {
    private readonly props: ReconciliationProps;
    private readonly domainEvents: BaseDomainEvent[] = [];

    constructor(props: ReconciliationProps) {
        this.props = { ...props };
        this.validate();
    }

    // Domain Events
    getDomainEvents(): BaseDomainEvent[] {
        return [...this.domainEvents];
    }

    clearDomainEvents(): void {
        this.domainEvents.length = 0;
    }

    // Getters
    get id(): string { return this.props.id; }
    get bankAccountId(): string { return this.props.bankAccountId; }
    get statementDate(): IsoDate { return this.props.statementDate; }
    get statementEndingBalance(): Money { return this.props.statementEndingBalance; }
    get calculatedBookBalance(): Money | null { return this.props.calculatedBookBalance; }
    get difference(): Money | null { return this.props.difference; }
    get status(): ReconciliationStatus { return this.props.status; }
    get notes(): string | null { return this.props.notes; }
    get createdBy(): string { return this.props.createdBy; }
    get createdAt(): Date { return this.props.createdAt; }
    get updatedAt(): Date { return this.props.updatedAt; }
    get finalizedAt(): Date | null { return this.props.finalizedAt; }

    get currency(): string { return this.props.statementEndingBalance.currency; }

    isFinalized(): boolean {
        return this.props.status === ReconciliationStatus.FINALIZED;
    }

    /**
     * Revises the statement ending balance of an open draft.
     */
    reviseStatementBalance(statementEndingBalance: Money, notes?: string | null): void {
        this.ensureDraft();

        this.props.statementEndingBalance = statementEndingBalance;
        if (notes !== undefined) {
            this.props.notes = notes;
        }
        this.props.updatedAt = new Date();
    }

    /**
     * Locks the draft in as permanent. Balance checks happen before this is called.
     */
    finalize(params: {
        statementEndingBalance: Money;
        calculatedBookBalance: Money;
        difference: Money;
        finalizedBy: string;
        notes?: string | null;
    }): void {
        this.ensureDraft();

        const now = new Date();
        this.props.status = ReconciliationStatus.FINALIZED;
        this.props.statementEndingBalance = params.statementEndingBalance;
        this.props.calculatedBookBalance = params.calculatedBookBalance;
        this.props.difference = params.difference;
        if (params.notes !== undefined) {
            this.props.notes = params.notes;
        }
        this.props.finalizedAt = now;
        this.props.updatedAt = now;

        this.domainEvents.push(new ReconciliationFinalizedEvent(this.props.id, {
            actorId: params.finalizedBy,
            bankAccountId: this.props.bankAccountId,
            statementDate: this.props.statementDate,
            statementEndingBalance: params.statementEndingBalance.amount,
            calculatedBookBalance: params.calculatedBookBalance.amount,
            difference: params.difference.amount,
            currency: this.currency,
            finalizedAt: now
        }));
    }

    private ensureDraft(): void {
        if (this.props.status === ReconciliationStatus.FINALIZED) {
            throw new AlreadyFinalizedException(this.props.id, this.props.finalizedAt);
        }
    }

    private validate(): void {
        if (this.props.status === ReconciliationStatus.FINALIZED) {
            if (!this.props.calculatedBookBalance || !this.props.difference || !this.props.finalizedAt) {
                throw new Error(`Finalized reconciliation ${this.props.id} is missing its final figures`);
            }
        }
    }

    toJSON() {
        return {
            id: this.props.id,
            bankAccountId: this.props.bankAccountId,
            statementDate: this.props.statementDate,
            statementEndingBalance: this.props.statementEndingBalance.amount,
            calculatedBookBalance: this.props.calculatedBookBalance?.amount ?? null,
            difference: this.props.difference?.amount ?? null,
            currency: this.currency,
            status: this.props.status,
            notes: this.props.notes,
            createdBy: this.props.createdBy,
            createdAt: this.props.createdAt.toISOString(),
            updatedAt: this.props.updatedAt.toISOString(),
            finalizedAt: this.props.finalizedAt?.toISOString() ?? null
        };
    }
}
