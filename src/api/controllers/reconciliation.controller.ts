// src/api/controllers/reconciliation.controller.ts
import { FastifyReply, FastifyRequest } from 'fastify';
import { BankReconciliationApplicationService } from '../../core/application/services/bank-reconciliation.application.service';
import { BankTransactionEntity } from '../../core/domain/entities/bank-transaction.entity';
import { summaryToJSON } from '../../core/domain/services/reconciliation-calculator.service';
import { HTTP_STATUS } from '../../shared/constants/status-codes';
import { ApiResponse } from '../../shared/types/common.types';
import { FailureKind, ReconciliationResult } from '../../shared/types/result.types';
import { ValidationUtil } from '../../shared/utils/validation.util';
import {
    actorHeadersSchema,
    bookBodySchema,
    draftBodySchema,
    finalizeBodySchema,
    historyParamsSchema,
    historyQuerySchema,
    matchBodySchema,
    previewBodySchema,
    reconciliationParamsSchema,
    statementItemParamsSchema,
    unmatchBodySchema
} from '../validators/reconciliation.validator';

export const STATUS_BY_FAILURE: Readonly<Record<FailureKind, number>> = {
    VALIDATION_ERROR: HTTP_STATUS.BAD_REQUEST,
    UNBALANCED_SELECTION: HTTP_STATUS.UNPROCESSABLE_ENTITY,
    IMMUTABLE_RECORD: HTTP_STATUS.CONFLICT,
    NOT_BALANCED: HTTP_STATUS.UNPROCESSABLE_ENTITY,
    ALREADY_FINALIZED: HTTP_STATUS.CONFLICT,
    NOT_FOUND: HTTP_STATUS.NOT_FOUND,
    PERSISTENCE_ERROR: HTTP_STATUS.INTERNAL_ERROR
};

const transactionsToJSON = (items: BankTransactionEntity[]) => items.map(item => item.toJSON());

export class ReconciliationController {
    constructor(private readonly service: BankReconciliationApplicationService) {}

    /**
     * POST /drafts
     */
    async getOrCreateDraft(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const actorId = this.actorOf(request);
        const body = ValidationUtil.validate(draftBodySchema, request.body, 'Invalid request body');

        const result = await this.service.getOrCreateDraft({ ...body, actorId });
        this.send(reply, result, draft => draft.toJSON());
    }

    /**
     * POST /workspace
     */
    async loadWorkspace(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const actorId = this.actorOf(request);
        const body = ValidationUtil.validate(draftBodySchema, request.body, 'Invalid request body');

        const result = await this.service.loadWorkspace({ ...body, actorId });
        this.send(reply, result, workspace => ({
            draft: workspace.draft.toJSON(),
            statementItems: transactionsToJSON(workspace.statementItems),
            systemItems: transactionsToJSON(workspace.systemItems),
            summary: summaryToJSON(workspace.summary)
        }));
    }

    /**
     * GET /:id/summary
     */
    async getSummary(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const { id } = ValidationUtil.validate(reconciliationParamsSchema, request.params);

        const result = await this.service.getSummary(id);
        this.send(reply, result, view => ({
            reconciliation: view.reconciliation.toJSON(),
            summary: summaryToJSON(view.summary)
        }));
    }

    /**
     * POST /:id/matches
     */
    async match(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const actorId = this.actorOf(request);
        const { id } = ValidationUtil.validate(reconciliationParamsSchema, request.params);
        const body = ValidationUtil.validate(matchBodySchema, request.body, 'Invalid request body');

        const result = await this.service.match({ ...body, draftId: id, actorId });
        this.send(reply, result, outcome => ({
            reconciliationId: outcome.reconciliationId,
            statementTransactionIds: outcome.statementTransactionIds,
            systemTransactionIds: outcome.systemTransactionIds,
            statementSum: outcome.statementSum.amount,
            systemSum: outcome.systemSum.amount
        }));
    }

    /**
     * POST /:id/matches/preview
     */
    async previewSelection(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const { id } = ValidationUtil.validate(reconciliationParamsSchema, request.params);
        const body = ValidationUtil.validate(previewBodySchema, request.body, 'Invalid request body');

        const result = await this.service.previewSelection({ ...body, draftId: id });
        this.send(reply, result, preview => ({
            statementSum: preview.statementSum.amount,
            systemSum: preview.systemSum.amount,
            difference: preview.difference.amount,
            isBalanced: preview.isBalanced,
            tolerance: preview.tolerance.amount
        }));
    }

    /**
     * POST /matches/unmatch
     */
    async unmatch(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const actorId = this.actorOf(request);
        const body = ValidationUtil.validate(unmatchBodySchema, request.body, 'Invalid request body');

        const result = await this.service.unmatch({ ...body, actorId });
        this.send(reply, result, outcome => outcome);
    }

    /**
     * POST /:id/statement-items/:transactionId/book
     */
    async bookStatementItem(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const actorId = this.actorOf(request);
        const { id, transactionId } = ValidationUtil.validate(statementItemParamsSchema, request.params);
        const body = ValidationUtil.validate(bookBodySchema, request.body, 'Invalid request body');

        const result = await this.service.bookStatementItem({
            ...body,
            draftId: id,
            statementTransactionId: transactionId,
            actorId
        });
        this.send(reply, result, outcome => ({
            journalEntryId: outcome.journalEntryId,
            systemTransaction: outcome.systemTransaction.toJSON()
        }), HTTP_STATUS.CREATED);
    }

    /**
     * POST /:id/finalize
     */
    async finalize(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const actorId = this.actorOf(request);
        const { id } = ValidationUtil.validate(reconciliationParamsSchema, request.params);
        const body = ValidationUtil.validate(finalizeBodySchema, request.body, 'Invalid request body');

        const result = await this.service.finalize({ ...body, draftId: id, actorId });
        this.send(reply, result, reconciliation => reconciliation.toJSON());
    }

    /**
     * GET /history/:bankAccountId
     */
    async listHistory(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const { bankAccountId } = ValidationUtil.validate(historyParamsSchema, request.params);
        const query = ValidationUtil.validate(historyQuerySchema, request.query, 'Invalid query string');

        const result = await this.service.listHistory({ bankAccountId, ...query });
        this.send(reply, result, page => ({
            items: page.data.map(reconciliation => reconciliation.toJSON()),
            pagination: page.pagination
        }));
    }

    /**
     * GET /:id/items
     */
    async getItemsForReconciliation(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const { id } = ValidationUtil.validate(reconciliationParamsSchema, request.params);

        const result = await this.service.getItemsForReconciliation(id);
        this.send(reply, result, items => ({
            reconciliation: items.reconciliation.toJSON(),
            statementItems: transactionsToJSON(items.statementItems),
            systemItems: transactionsToJSON(items.systemItems)
        }));
    }

    private actorOf(request: FastifyRequest): string {
        return ValidationUtil.validate(actorHeadersSchema, request.headers, 'Missing actor')['x-actor-id'];
    }

    private send<T, R>(
        reply: FastifyReply,
        result: ReconciliationResult<T>,
        present: (value: T) => R,
        successStatus: number = HTTP_STATUS.SUCCESS
    ): void {
        const meta = { timestamp: new Date().toISOString() };

        if (result.success) {
            const body: ApiResponse<R> = { success: true, data: present(result.value), meta };
            reply.code(successStatus).send(body);
            return;
        }

        const body: ApiResponse<R> = { success: false, error: result.error, meta };
        reply.code(STATUS_BY_FAILURE[result.error.kind]).send(body);
    }
}
