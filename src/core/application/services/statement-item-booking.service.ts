// src/core/application/services/statement-item-booking.service.ts
import { v4 as uuidv4 } from 'uuid';
import {
    BankTransactionEntity,
    signMatchesType,
    typeForStatementAmount
} from '../../domain/entities/bank-transaction.entity';
import { StatementItemBookedEvent } from '../../domain/events/reconciliation-events';
import { JournalLine } from '../../domain/repositories/collaborators';
import { TransactionalContext } from '../../domain/repositories/unit-of-work';
import { Money } from '../../domain/value-objects/money.vo';
import { ValidBookStatementItemCommand } from '../dtos/reconciliation.dto';
import { ImmutableRecordException } from '../../../shared/exceptions/business.exception';
import { NotFoundException } from '../../../shared/exceptions/not-found.exception';
import { FieldError, ValidationException } from '../../../shared/exceptions/validation.exception';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { ReconciliationSummaryService } from './reconciliation-summary.service';

const MAX_DESCRIPTION_LENGTH = 200;

export interface BookingOutcome {
    journalEntryId: string;
    systemTransaction: BankTransactionEntity;
}

/**
 * Records a statement-only item (bank interest, a fee) in the books so that it
 * can be matched. Posts a two-line journal entry and adds the system-side
 * bank transaction it produces.
 */
export class StatementItemBookingService {
    constructor(private readonly summaryService: ReconciliationSummaryService) {}

    async bookStatementItem(context: TransactionalContext, command: ValidBookStatementItemCommand): Promise<BookingOutcome> {
        const draft = await context.reconciliations.findById(command.draftId, { forUpdate: true });
        if (!draft) {
            throw new NotFoundException('Reconciliation', command.draftId);
        }
        if (draft.isFinalized()) {
            throw new ImmutableRecordException(draft.id, draft.id, 'is a finalized reconciliation');
        }

        const [item] = await context.transactions.findByIds([command.statementTransactionId], { forUpdate: true });
        if (!item) {
            throw new NotFoundException('BankTransaction', command.statementTransactionId);
        }

        const account = await this.summaryService.requireBankAccount(context, draft.bankAccountId);

        const errors: FieldError[] = [];
        if (item.bankAccountId !== draft.bankAccountId) {
            errors.push({ field: 'statementTransactionId', message: 'Transaction belongs to another bank account', value: item.id });
        }
        if (!item.isFromStatement) {
            errors.push({ field: 'statementTransactionId', message: 'Only statement transactions can be booked', value: item.id });
        }
        if (item.isReconciled) {
            errors.push({ field: 'statementTransactionId', message: 'Transaction is already reconciled', value: item.id });
        }
        if (item.transactionDate > draft.statementDate) {
            errors.push({ field: 'statementTransactionId', message: 'Transaction is dated after the statement date', value: item.id });
        }
        if (item.amount.isZero()) {
            errors.push({ field: 'statementTransactionId', message: 'A zero amount has nothing to book', value: item.id });
        }
        if (command.contraGlAccountId === account.glAccountId) {
            errors.push({
                field: 'contraGlAccountId',
                message: "Contra account cannot be the bank account's own GL account",
                value: command.contraGlAccountId
            });
        }
        if (errors.length > 0) {
            throw new ValidationException('Statement item cannot be booked', errors);
        }

        const description = (command.description ?? `Bank Rec: ${item.description}`).slice(0, MAX_DESCRIPTION_LENGTH);
        const lines = this.buildLines(item.amount, account.glAccountId, command.contraGlAccountId, description);

        const journalEntryId = await context.journal.createAndPost(
            lines,
            item.transactionDate,
            `Entry for statement item: ${item.description}`.slice(0, MAX_DESCRIPTION_LENGTH),
            { actorId: command.actorId, reference: item.reference }
        );

        const now = new Date();
        const systemTransaction = new BankTransactionEntity({
            id: uuidv4(),
            bankAccountId: item.bankAccountId,
            transactionDate: item.transactionDate,
            amount: item.amount,
            description,
            reference: item.reference,
            transactionType: signMatchesType(item.transactionType, item.amount)
                ? item.transactionType
                : typeForStatementAmount(item.amount),
            isFromStatement: false,
            isReconciled: false,
            reconciledDate: null,
            reconciliationId: null,
            journalEntryId,
            createdBy: command.actorId,
            createdAt: now,
            updatedAt: now
        });

        await context.transactions.create(systemTransaction);

        context.addDomainEvent(new StatementItemBookedEvent(draft.id, {
            actorId: command.actorId,
            statementTransactionId: item.id,
            systemTransactionId: systemTransaction.id,
            journalEntryId,
            amount: item.amount.amount,
            currency: item.amount.currency
        }));

        logger.info('Statement item booked', {
            reconciliationId: draft.id,
            statementTransactionId: item.id,
            systemTransactionId: systemTransaction.id,
            journalEntryId
        });

        return { journalEntryId, systemTransaction };
    }

    /**
     * Inflows debit the bank's GL account, outflows credit it; the contra line mirrors it.
     */
    private buildLines(amount: Money, bankGlAccountId: string, contraGlAccountId: string, description: string): JournalLine[] {
        const value = amount.abs();
        const zero = Money.zero(amount.currency);
        const inflow = amount.isPositive();

        return [
            {
                glAccountId: bankGlAccountId,
                debit: inflow ? value : zero,
                credit: inflow ? zero : value,
                description
            },
            {
                glAccountId: contraGlAccountId,
                debit: inflow ? zero : value,
                credit: inflow ? value : zero,
                description
            }
        ];
    }
}
