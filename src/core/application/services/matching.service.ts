// src/core/application/services/matching.service.ts
import { BankTransactionEntity } from '../../domain/entities/bank-transaction.entity';
import { ReconciliationEntity } from '../../domain/entities/reconciliation.entity';
import { TransactionsMatchedEvent, TransactionsUnmatchedEvent } from '../../domain/events/reconciliation-events';
import { ReconciliationStores, TransactionalContext } from '../../domain/repositories/unit-of-work';
import { Money } from '../../domain/value-objects/money.vo';
import { ValidMatchCommand, ValidUnmatchCommand } from '../dtos/reconciliation.dto';
import { ImmutableRecordException, UnbalancedSelectionException } from '../../../shared/exceptions/business.exception';
import { NotFoundException } from '../../../shared/exceptions/not-found.exception';
import { FieldError, ValidationException } from '../../../shared/exceptions/validation.exception';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { ReconciliationSummaryService } from './reconciliation-summary.service';

export interface MatchOutcome {
    reconciliationId: string;
    statementTransactionIds: string[];
    systemTransactionIds: string[];
    statementSum: Money;
    systemSum: Money;
}

export interface UnmatchOutcome {
    transactionIds: string[];
    reconciliationIds: string[];
}

export interface SelectionPreview {
    statementSum: Money;
    systemSum: Money;
    difference: Money;
    isBalanced: boolean;
    tolerance: Money;
}

/**
 * Claims and releases bank transactions for draft reconciliations.
 *
 * Lock order is always reconciliation rows first, then transaction rows
 * (sorted by id in the repository), so concurrent match, unmatch and
 * finalize calls queue behind each other instead of deadlocking.
 */
export class MatchingService {
    constructor(private readonly summaryService: ReconciliationSummaryService) {}

    /**
     * Claims both selections for the draft when their signed sums agree within tolerance.
     * Preconditions are checked against locked rows, so a transaction claimed by a
     * concurrent session since the caller's last read fails the call instead of being taken twice.
     */
    async match(context: TransactionalContext, command: ValidMatchCommand): Promise<MatchOutcome> {
        const draft = await this.requireOpenDraft(context, command.draftId);

        if (command.statementDate !== draft.statementDate) {
            throw ValidationException.forField(
                'statementDate',
                `Statement date ${command.statementDate} does not match the draft's statement date ${draft.statementDate}`,
                command.statementDate
            );
        }

        const ids = [...command.statementTransactionIds, ...command.systemTransactionIds];
        const byId = await this.loadAll(context, ids, true);

        const statementItems = command.statementTransactionIds.map(id => this.pick(byId, id));
        const systemItems = command.systemTransactionIds.map(id => this.pick(byId, id));

        const errors = [
            ...this.checkEligibility(draft, statementItems, 'statementTransactionIds', true),
            ...this.checkEligibility(draft, systemItems, 'systemTransactionIds', false)
        ];
        if (errors.length > 0) {
            throw new ValidationException('Selected transactions cannot be matched', errors);
        }

        const tolerance = this.summaryService.tolerance(draft.currency);
        const statementSum = Money.sum(statementItems.map(item => item.amount), draft.currency);
        const systemSum = Money.sum(systemItems.map(item => item.amount), draft.currency);

        if (!statementSum.isWithin(systemSum, tolerance)) {
            logger.debug('Unbalanced selection rejected', {
                reconciliationId: draft.id,
                statementSum: statementSum.amount,
                systemSum: systemSum.amount
            });
            throw new UnbalancedSelectionException(statementSum.amount, systemSum.amount, tolerance.amount);
        }

        const claimed = [...statementItems, ...systemItems];
        claimed.forEach(item => item.claim(draft.id, draft.statementDate));
        await context.transactions.updateMatchState(claimed);

        context.addDomainEvent(new TransactionsMatchedEvent(draft.id, {
            actorId: command.actorId,
            bankAccountId: draft.bankAccountId,
            statementDate: draft.statementDate,
            statementTransactionIds: command.statementTransactionIds,
            systemTransactionIds: command.systemTransactionIds,
            statementSum: statementSum.amount,
            systemSum: systemSum.amount
        }));

        logger.info('Transactions matched', {
            reconciliationId: draft.id,
            statementCount: statementItems.length,
            systemCount: systemItems.length,
            amount: statementSum.amount
        });

        return {
            reconciliationId: draft.id,
            statementTransactionIds: command.statementTransactionIds,
            systemTransactionIds: command.systemTransactionIds,
            statementSum,
            systemSum
        };
    }

    /**
     * Returns transactions to the unreconciled pool. All or nothing: one transaction of a
     * finalized reconciliation rejects the whole request.
     */
    async unmatch(context: TransactionalContext, command: ValidUnmatchCommand): Promise<UnmatchOutcome> {
        const preview = await this.loadAll(context, command.transactionIds, false);

        const owners = new Map<string, ReconciliationEntity>();
        await this.lockOwners(context, [...preview.values()], owners);

        const byId = await this.loadAll(context, command.transactionIds, true);
        const transactions = command.transactionIds.map(id => this.pick(byId, id));

        // ownership may have moved between the unlocked read and the locked one
        await this.lockOwners(context, transactions, owners);

        const byReconciliation = new Map<string, string[]>();
        for (const tx of transactions) {
            if (tx.reconciliationId === null) continue;

            const owner = owners.get(tx.reconciliationId);
            if (!owner) {
                throw new NotFoundException('Reconciliation', tx.reconciliationId);
            }
            if (owner.isFinalized()) {
                throw new ImmutableRecordException(tx.id, owner.id);
            }
            byReconciliation.set(owner.id, [...(byReconciliation.get(owner.id) ?? []), tx.id]);
        }

        const notReconciled = transactions.filter(tx => !tx.isReconciled);
        if (notReconciled.length > 0) {
            throw new ValidationException(
                'Only reconciled transactions can be unmatched',
                notReconciled.map(tx => ({ field: 'transactionIds', message: `Transaction ${tx.id} is not reconciled`, value: tx.id }))
            );
        }

        transactions.forEach(tx => tx.release());
        await context.transactions.updateMatchState(transactions);

        for (const [reconciliationId, transactionIds] of byReconciliation) {
            context.addDomainEvent(new TransactionsUnmatchedEvent(reconciliationId, {
                actorId: command.actorId,
                transactionIds
            }));
        }

        logger.info('Transactions unmatched', {
            transactionCount: transactions.length,
            reconciliationIds: [...byReconciliation.keys()]
        });

        return {
            transactionIds: command.transactionIds,
            reconciliationIds: [...byReconciliation.keys()]
        };
    }

    /**
     * Sums of a prospective selection, for display before calling `match`. Takes no locks.
     */
    async previewSelection(
        stores: ReconciliationStores,
        reconciliation: ReconciliationEntity,
        statementTransactionIds: string[],
        systemTransactionIds: string[]
    ): Promise<SelectionPreview> {
        const byId = await this.loadAll(stores, [...statementTransactionIds, ...systemTransactionIds], false);
        const currency = reconciliation.currency;
        const tolerance = this.summaryService.tolerance(currency);

        const statementSum = Money.sum(statementTransactionIds.map(id => this.pick(byId, id).amount), currency);
        const systemSum = Money.sum(systemTransactionIds.map(id => this.pick(byId, id).amount), currency);
        const difference = statementSum.subtract(systemSum);

        return {
            statementSum,
            systemSum,
            difference,
            isBalanced: statementTransactionIds.length > 0
                && systemTransactionIds.length > 0
                && statementSum.isWithin(systemSum, tolerance),
            tolerance
        };
    }

    private async requireOpenDraft(context: TransactionalContext, draftId: string): Promise<ReconciliationEntity> {
        const draft = await context.reconciliations.findById(draftId, { forUpdate: true });
        if (!draft) {
            throw new NotFoundException('Reconciliation', draftId);
        }
        if (draft.isFinalized()) {
            throw new ImmutableRecordException(draft.id, draft.id, 'is a finalized reconciliation');
        }
        return draft;
    }

    private async lockOwners(
        context: TransactionalContext,
        transactions: BankTransactionEntity[],
        owners: Map<string, ReconciliationEntity>
    ): Promise<void> {
        const pending = [...new Set(
            transactions
                .map(tx => tx.reconciliationId)
                .filter((id): id is string => id !== null && !owners.has(id))
        )].sort();

        for (const reconciliationId of pending) {
            const owner = await context.reconciliations.findById(reconciliationId, { forUpdate: true });
            if (owner) {
                owners.set(reconciliationId, owner);
            }
        }
    }

    private async loadAll(
        stores: ReconciliationStores,
        ids: string[],
        forUpdate: boolean
    ): Promise<Map<string, BankTransactionEntity>> {
        const rows = await stores.transactions.findByIds(ids, { forUpdate });
        const byId = new Map(rows.map(row => [row.id, row]));

        const missing = ids.find(id => !byId.has(id));
        if (missing !== undefined) {
            throw new NotFoundException('BankTransaction', missing);
        }
        return byId;
    }

    private pick(byId: Map<string, BankTransactionEntity>, id: string): BankTransactionEntity {
        const transaction = byId.get(id);
        if (!transaction) {
            throw new NotFoundException('BankTransaction', id);
        }
        return transaction;
    }

    private checkEligibility(
        draft: ReconciliationEntity,
        items: BankTransactionEntity[],
        field: string,
        fromStatement: boolean
    ): FieldError[] {
        const errors: FieldError[] = [];

        for (const item of items) {
            if (item.bankAccountId !== draft.bankAccountId) {
                errors.push({ field, message: `Transaction ${item.id} belongs to another bank account`, value: item.id });
            } else if (item.isFromStatement !== fromStatement) {
                errors.push({
                    field,
                    message: `Transaction ${item.id} is not a ${fromStatement ? 'statement' : 'system'} transaction`,
                    value: item.id
                });
            } else if (item.isReconciled) {
                errors.push({ field, message: `Transaction ${item.id} is already reconciled`, value: item.id });
            } else if (item.transactionDate > draft.statementDate) {
                errors.push({ field, message: `Transaction ${item.id} is dated after the statement date`, value: item.id });
            }
        }

        return errors;
    }
}
