// src/core/application/services/bank-reconciliation.application.service.ts
import { BankTransactionEntity } from '../../domain/entities/bank-transaction.entity';
import { ReconciliationEntity } from '../../domain/entities/reconciliation.entity';
import { IUnitOfWorkFactory, ReconciliationStores } from '../../domain/repositories/unit-of-work';
import { ReconciliationSummary } from '../../domain/services/reconciliation-calculator.service';
import {
    BookStatementItemCommand,
    bookStatementItemSchema,
    FinalizeCommand,
    finalizeSchema,
    GetOrCreateDraftCommand,
    getOrCreateDraftSchema,
    ListHistoryQuery,
    listHistorySchema,
    MatchCommand,
    matchSchema,
    PreviewSelectionQuery,
    previewSelectionSchema,
    reconciliationIdSchema,
    UnmatchCommand,
    unmatchSchema
} from '../dtos/reconciliation.dto';
import { BaseException } from '../../../shared/exceptions/base.exception';
import { NotFoundException } from '../../../shared/exceptions/not-found.exception';
import { PaginatedResult } from '../../../shared/types/common.types';
import { ReconciliationResult, Result } from '../../../shared/types/result.types';
import { ValidationUtil } from '../../../shared/utils/validation.util';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { FinalizationService } from './finalization.service';
import { MatchingService, MatchOutcome, SelectionPreview, UnmatchOutcome } from './matching.service';
import { ReconciliationDraftService } from './reconciliation-draft.service';
import { ReconciliationSettings, ReconciliationSummaryService } from './reconciliation-summary.service';
import { BookingOutcome, StatementItemBookingService } from './statement-item-booking.service';
import { TransactionPoolService } from './transaction-pool.service';

export interface ReconciliationWorkspace {
    draft: ReconciliationEntity;
    statementItems: BankTransactionEntity[];
    systemItems: BankTransactionEntity[];
    summary: ReconciliationSummary;
}

export interface ReconciliationSummaryView {
    reconciliation: ReconciliationEntity;
    summary: ReconciliationSummary;
}

export interface ReconciliationItems {
    reconciliation: ReconciliationEntity;
    statementItems: BankTransactionEntity[];
    systemItems: BankTransactionEntity[];
}

/**
 * Entry point of the reconciliation engine. Every operation validates its input
 * before touching the store, runs mutations in one unit of work, and reports
 * business failures as values. Only unexpected errors are thrown.
 */
export class BankReconciliationApplicationService {
    private readonly poolService = new TransactionPoolService();
    private readonly summaryService: ReconciliationSummaryService;
    private readonly draftService: ReconciliationDraftService;
    private readonly matchingService: MatchingService;
    private readonly finalizationService: FinalizationService;
    private readonly bookingService: StatementItemBookingService;

    constructor(
        private readonly unitOfWorkFactory: IUnitOfWorkFactory,
        settings: ReconciliationSettings
    ) {
        this.summaryService = new ReconciliationSummaryService(this.poolService, settings);
        this.draftService = new ReconciliationDraftService(this.summaryService, settings);
        this.matchingService = new MatchingService(this.summaryService);
        this.finalizationService = new FinalizationService(this.summaryService);
        this.bookingService = new StatementItemBookingService(this.summaryService);
    }

    getOrCreateDraft(command: GetOrCreateDraftCommand): Promise<ReconciliationResult<ReconciliationEntity>> {
        return this.run('getOrCreateDraft', async () => {
            const valid = ValidationUtil.validate(getOrCreateDraftSchema, command, 'Invalid draft request');
            return this.unitOfWorkFactory.execute(context => this.draftService.getOrCreateDraft(context, valid));
        });
    }

    /**
     * Opens or resumes the draft and returns both unreconciled pools with a fresh summary.
     */
    loadWorkspace(command: GetOrCreateDraftCommand): Promise<ReconciliationResult<ReconciliationWorkspace>> {
        return this.run('loadWorkspace', async () => {
            const valid = ValidationUtil.validate(getOrCreateDraftSchema, command, 'Invalid workspace request');

            return this.unitOfWorkFactory.execute(async context => {
                const draft = await this.draftService.getOrCreateDraft(context, valid);
                const { summary, pools } = await this.summaryService.summarize(context, draft);
                return { draft, ...pools, summary };
            });
        });
    }

    getSummary(reconciliationId: string): Promise<ReconciliationResult<ReconciliationSummaryView>> {
        return this.run('getSummary', async () => {
            const valid = ValidationUtil.validate(reconciliationIdSchema, { reconciliationId });

            return this.unitOfWorkFactory.read(async stores => {
                const reconciliation = await this.requireReconciliation(stores, valid.reconciliationId);
                const { summary } = await this.summaryService.summarize(stores, reconciliation);
                return { reconciliation, summary };
            });
        });
    }

    match(command: MatchCommand): Promise<ReconciliationResult<MatchOutcome>> {
        return this.run('match', async () => {
            const valid = ValidationUtil.validate(matchSchema, command, 'Invalid match request');
            return this.unitOfWorkFactory.execute(context => this.matchingService.match(context, valid));
        });
    }

    previewSelection(query: PreviewSelectionQuery): Promise<ReconciliationResult<SelectionPreview>> {
        return this.run('previewSelection', async () => {
            const valid = ValidationUtil.validate(previewSelectionSchema, query, 'Invalid selection');

            return this.unitOfWorkFactory.read(async stores => {
                const reconciliation = await this.requireReconciliation(stores, valid.draftId);
                return this.matchingService.previewSelection(
                    stores,
                    reconciliation,
                    valid.statementTransactionIds,
                    valid.systemTransactionIds
                );
            });
        });
    }

    unmatch(command: UnmatchCommand): Promise<ReconciliationResult<UnmatchOutcome>> {
        return this.run('unmatch', async () => {
            const valid = ValidationUtil.validate(unmatchSchema, command, 'Invalid unmatch request');
            return this.unitOfWorkFactory.execute(context => this.matchingService.unmatch(context, valid));
        });
    }

    finalize(command: FinalizeCommand): Promise<ReconciliationResult<ReconciliationEntity>> {
        return this.run('finalize', async () => {
            const valid = ValidationUtil.validate(finalizeSchema, command, 'Invalid finalize request');
            return this.unitOfWorkFactory.execute(context => this.finalizationService.finalize(context, valid));
        });
    }

    bookStatementItem(command: BookStatementItemCommand): Promise<ReconciliationResult<BookingOutcome>> {
        return this.run('bookStatementItem', async () => {
            const valid = ValidationUtil.validate(bookStatementItemSchema, command, 'Invalid booking request');
            return this.unitOfWorkFactory.execute(context => this.bookingService.bookStatementItem(context, valid));
        });
    }

    listHistory(query: ListHistoryQuery): Promise<ReconciliationResult<PaginatedResult<ReconciliationEntity>>> {
        return this.run('listHistory', async () => {
            const valid = ValidationUtil.validate(listHistorySchema, query, 'Invalid history query');
            return this.unitOfWorkFactory.read(stores => this.draftService.listHistory(stores, valid));
        });
    }

    /**
     * The reconciliation with the statement and system items it claimed.
     */
    getItemsForReconciliation(reconciliationId: string): Promise<ReconciliationResult<ReconciliationItems>> {
        return this.run('getItemsForReconciliation', async () => {
            const valid = ValidationUtil.validate(reconciliationIdSchema, { reconciliationId });

            return this.unitOfWorkFactory.read(async stores => {
                const reconciliation = await this.requireReconciliation(stores, valid.reconciliationId);
                const pools = await this.poolService.getItemsForReconciliation(stores, reconciliation.id);
                return { reconciliation, ...pools };
            });
        });
    }

    private async requireReconciliation(stores: ReconciliationStores, id: string): Promise<ReconciliationEntity> {
        const reconciliation = await stores.reconciliations.findById(id);
        if (!reconciliation) {
            throw new NotFoundException('Reconciliation', id);
        }
        return reconciliation;
    }

    private async run<T>(operation: string, work: () => Promise<T>): Promise<ReconciliationResult<T>> {
        try {
            return Result.ok(await work());
        } catch (error) {
            if (error instanceof BaseException) {
                logger.warn('Reconciliation operation failed', {
                    operation,
                    code: error.code,
                    message: error.message
                });
                return Result.fail(error);
            }

            logger.error('Unexpected error in reconciliation operation', error instanceof Error ? error : undefined, {
                operation
            });
            throw error;
        }
    }
}
