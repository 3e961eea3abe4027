// src/core/application/services/reconciliation-draft.service.ts
import { v4 as uuidv4 } from 'uuid';
import { ReconciliationEntity, ReconciliationStatus } from '../../domain/entities/reconciliation.entity';
import { ReconciliationDraftOpenedEvent } from '../../domain/events/reconciliation-events';
import { ReconciliationStores, TransactionalContext } from '../../domain/repositories/unit-of-work';
import { Money } from '../../domain/value-objects/money.vo';
import { ValidGetOrCreateDraftCommand, ValidListHistoryQuery } from '../dtos/reconciliation.dto';
import { DatabaseException } from '../../../shared/exceptions/infrastructure.exception';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { buildPagination, PaginatedResult } from '../../../shared/types/common.types';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { ReconciliationSettings, ReconciliationSummaryService } from './reconciliation-summary.service';

/**
 * Lifecycle of reconciliation records up to finalization.
 */
export class ReconciliationDraftService {
    constructor(
        private readonly summaryService: ReconciliationSummaryService,
        private readonly settings: ReconciliationSettings
    ) {}

    /**
     * Resumes the open draft for the account and statement date, or opens one.
     * A draft that a concurrent session inserted first is resumed rather than duplicated.
     */
    async getOrCreateDraft(context: TransactionalContext, command: ValidGetOrCreateDraftCommand): Promise<ReconciliationEntity> {
        const account = await this.summaryService.requireBankAccount(context, command.bankAccountId);
        if (!account.isActive) {
            throw ValidationException.forField('bankAccountId', `Bank account ${account.id} is inactive`, account.id);
        }
        const balance = Money.of(command.statementEndingBalance, account.currencyCode);

        const existing = await context.reconciliations.findOpenDraft(command.bankAccountId, command.statementDate, { forUpdate: true });
        if (existing) {
            return this.resume(context, existing, balance, command);
        }

        const now = new Date();
        const draft = new ReconciliationEntity({
            id: uuidv4(),
            bankAccountId: command.bankAccountId,
            statementDate: command.statementDate,
            statementEndingBalance: balance,
            calculatedBookBalance: null,
            difference: null,
            status: ReconciliationStatus.DRAFT,
            notes: command.notes ?? null,
            createdBy: command.actorId,
            createdAt: now,
            updatedAt: now,
            finalizedAt: null
        });

        if (await context.reconciliations.insertDraft(draft)) {
            context.addDomainEvent(this.openedEvent(draft, command.actorId, false));

            logger.info('Reconciliation draft opened', {
                reconciliationId: draft.id,
                bankAccountId: draft.bankAccountId,
                statementDate: draft.statementDate
            });
            return draft;
        }

        const winner = await context.reconciliations.findOpenDraft(command.bankAccountId, command.statementDate, { forUpdate: true });
        if (!winner) {
            throw new DatabaseException('Draft insert conflicted but no open draft was found', {
                bankAccountId: command.bankAccountId,
                statementDate: command.statementDate
            });
        }

        logger.debug('Concurrent draft creation detected, resuming existing draft', { reconciliationId: winner.id });
        return this.resume(context, winner, balance, command);
    }

    /**
     * Finalized reconciliations of an account, newest statement date first.
     */
    async listHistory(stores: ReconciliationStores, query: ValidListHistoryQuery): Promise<PaginatedResult<ReconciliationEntity>> {
        if (query.pageSize > this.settings.historyMaxPageSize) {
            throw ValidationException.forField(
                'pageSize',
                `Page size cannot exceed ${this.settings.historyMaxPageSize}`,
                query.pageSize
            );
        }

        const pagination = { page: query.page, pageSize: query.pageSize };
        const page = await stores.reconciliations.findFinalizedByBankAccount(query.bankAccountId, pagination);

        return {
            data: page.items,
            pagination: buildPagination(page.total, pagination)
        };
    }

    private async resume(
        context: TransactionalContext,
        draft: ReconciliationEntity,
        balance: Money,
        command: ValidGetOrCreateDraftCommand
    ): Promise<ReconciliationEntity> {
        draft.reviseStatementBalance(balance, command.notes);
        await context.reconciliations.save(draft);
        context.addDomainEvent(this.openedEvent(draft, command.actorId, true));

        logger.info('Reconciliation draft resumed', {
            reconciliationId: draft.id,
            statementEndingBalance: balance.amount
        });
        return draft;
    }

    private openedEvent(draft: ReconciliationEntity, actorId: string, resumed: boolean): ReconciliationDraftOpenedEvent {
        return new ReconciliationDraftOpenedEvent(draft.id, {
            actorId,
            bankAccountId: draft.bankAccountId,
            statementDate: draft.statementDate,
            statementEndingBalance: draft.statementEndingBalance.amount,
            resumed
        });
    }
}
