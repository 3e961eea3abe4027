// src/api/routes/reconciliation.routes.ts
import { FastifyPluginAsync } from 'fastify';
import { ReconciliationController } from '../controllers/reconciliation.controller';

export interface ReconciliationRoutesOptions {
    controller: ReconciliationController;
}

const reconciliationRoutes: FastifyPluginAsync<ReconciliationRoutesOptions> = async (fastify, options) => {
    const { controller } = options;

    fastify.post('/drafts', (request, reply) => controller.getOrCreateDraft(request, reply));
    fastify.post('/workspace', (request, reply) => controller.loadWorkspace(request, reply));
    fastify.get('/history/:bankAccountId', (request, reply) => controller.listHistory(request, reply));
    fastify.post('/matches/unmatch', (request, reply) => controller.unmatch(request, reply));

    fastify.get('/:id/summary', (request, reply) => controller.getSummary(request, reply));
    fastify.get('/:id/items', (request, reply) => controller.getItemsForReconciliation(request, reply));
    fastify.post('/:id/matches', (request, reply) => controller.match(request, reply));
    fastify.post('/:id/matches/preview', (request, reply) => controller.previewSelection(request, reply));
    fastify.post('/:id/statement-items/:transactionId/book', (request, reply) => controller.bookStatementItem(request, reply));
    fastify.post('/:id/finalize', (request, reply) => controller.finalize(request, reply));
};

export default reconciliationRoutes;
