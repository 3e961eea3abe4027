// src/core/application/services/finalization.service.ts
import { ReconciliationEntity } from '../../domain/entities/reconciliation.entity';
import { TransactionalContext } from '../../domain/repositories/unit-of-work';
import { Money } from '../../domain/value-objects/money.vo';
import { ValidFinalizeCommand } from '../dtos/reconciliation.dto';
import { AlreadyFinalizedException, NotBalancedException } from '../../../shared/exceptions/business.exception';
import { NotFoundException } from '../../../shared/exceptions/not-found.exception';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { ReconciliationSummaryService } from './reconciliation-summary.service';

export class FinalizationService {
    constructor(private readonly summaryService: ReconciliationSummaryService) {}

    /**
     * Locks a balanced draft in as permanent and stamps the bank account's last
     * reconciled date and balance. Claimed transactions are left as they are.
     */
    async finalize(context: TransactionalContext, command: ValidFinalizeCommand): Promise<ReconciliationEntity> {
        const reconciliation = await context.reconciliations.findById(command.draftId, { forUpdate: true });
        if (!reconciliation) {
            throw new NotFoundException('Reconciliation', command.draftId);
        }
        if (reconciliation.isFinalized()) {
            throw new AlreadyFinalizedException(reconciliation.id, reconciliation.finalizedAt);
        }

        const currency = reconciliation.currency;
        const tolerance = this.summaryService.tolerance(currency);
        const statementEndingBalance = Money.of(command.statementEndingBalance, currency);
        const bookBalance = Money.of(command.bookBalance, currency);
        const difference = Money.of(command.difference, currency);

        if (!difference.isBelow(tolerance)) {
            throw new NotBalancedException(difference.amount, tolerance.amount, { reconciliationId: reconciliation.id });
        }

        // the caller's figures may be stale, so the store gets the last word
        const { summary } = await this.summaryService.summarize(context, reconciliation, statementEndingBalance);
        if (!summary.isBalanced) {
            throw new NotBalancedException(summary.difference.amount, tolerance.amount, {
                reconciliationId: reconciliation.id,
                adjustedBookBalance: summary.adjustedBookBalance.amount,
                adjustedBankBalance: summary.adjustedBankBalance.amount
            });
        }

        reconciliation.finalize({
            statementEndingBalance,
            calculatedBookBalance: bookBalance,
            difference,
            finalizedBy: command.actorId,
            notes: command.notes
        });

        await context.reconciliations.save(reconciliation);
        await context.bankAccounts.recordReconciled(
            reconciliation.bankAccountId,
            reconciliation.statementDate,
            statementEndingBalance
        );

        reconciliation.getDomainEvents().forEach(event => context.addDomainEvent(event));
        reconciliation.clearDomainEvents();

        logger.info('Reconciliation finalized', {
            reconciliationId: reconciliation.id,
            bankAccountId: reconciliation.bankAccountId,
            statementDate: reconciliation.statementDate,
            difference: difference.amount
        });

        return reconciliation;
    }
}
