// src/core/domain/events/reconciliation-events.ts
import { BaseDomainEvent } from './base-domain.event';
import { IsoDate } from '../../../shared/types/common.types';

const AGGREGATE = 'Reconciliation';

export interface ReconciliationDraftOpenedPayload {
    actorId: string;
    bankAccountId: string;
    statementDate: IsoDate;
    statementEndingBalance: number;
    resumed: boolean;
}

export class ReconciliationDraftOpenedEvent extends BaseDomainEvent<ReconciliationDraftOpenedPayload> {
    static readonly TYPE = 'ReconciliationDraftOpened';

    constructor(reconciliationId: string, payload: ReconciliationDraftOpenedPayload) {
        super(reconciliationId, ReconciliationDraftOpenedEvent.TYPE, AGGREGATE, payload);
    }
}

export interface TransactionsMatchedPayload {
    actorId: string;
    bankAccountId: string;
    statementDate: IsoDate;
    statementTransactionIds: string[];
    systemTransactionIds: string[];
    statementSum: number;
    systemSum: number;
}

export class TransactionsMatchedEvent extends BaseDomainEvent<TransactionsMatchedPayload> {
    static readonly TYPE = 'TransactionsMatched';

    constructor(reconciliationId: string, payload: TransactionsMatchedPayload) {
        super(reconciliationId, TransactionsMatchedEvent.TYPE, AGGREGATE, payload);
    }

    get transactionCount(): number {
        return this.payload.statementTransactionIds.length + this.payload.systemTransactionIds.length;
    }
}

export interface TransactionsUnmatchedPayload {
    actorId: string;
    transactionIds: string[];
}

export class TransactionsUnmatchedEvent extends BaseDomainEvent<TransactionsUnmatchedPayload> {
    static readonly TYPE = 'TransactionsUnmatched';

    constructor(reconciliationId: string, payload: TransactionsUnmatchedPayload) {
        super(reconciliationId, TransactionsUnmatchedEvent.TYPE, AGGREGATE, payload);
    }
}

export interface ReconciliationFinalizedPayload {
    actorId: string;
    bankAccountId: string;
    statementDate: IsoDate;
    statementEndingBalance: number;
    calculatedBookBalance: number;
    difference: number;
    currency: string;
    finalizedAt: Date;
}

export class ReconciliationFinalizedEvent extends BaseDomainEvent<ReconciliationFinalizedPayload> {
    static readonly TYPE = 'ReconciliationFinalized';

    constructor(reconciliationId: string, payload: ReconciliationFinalizedPayload) {
        super(reconciliationId, ReconciliationFinalizedEvent.TYPE, AGGREGATE, payload);
    }
}

export interface StatementItemBookedPayload {
    actorId: string;
    statementTransactionId: string;
    systemTransactionId: string;
    journalEntryId: string;
    amount: number;
    currency: string;
}

export class StatementItemBookedEvent extends BaseDomainEvent<StatementItemBookedPayload> {
    static readonly TYPE = 'StatementItemBooked';

    constructor(reconciliationId: string, payload: StatementItemBookedPayload) {
        super(reconciliationId, StatementItemBookedEvent.TYPE, AGGREGATE, payload);
    }
}
