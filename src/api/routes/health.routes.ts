// src/api/routes/health.routes.ts
import { FastifyPluginAsync } from 'fastify';
import { HTTP_STATUS } from '../../shared/constants/status-codes';

export interface HealthRoutesOptions {
    /** Resolves true when the database answers. */
    checkDatabase: () => Promise<boolean>;
}

const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, options) => {
    fastify.get('/health', async (request, reply) => {
        const databaseUp = await options.checkDatabase();

        return reply.code(databaseUp ? HTTP_STATUS.SUCCESS : HTTP_STATUS.SERVICE_UNAVAILABLE).send({
            status: databaseUp ? 'ok' : 'degraded',
            service: 'bank-reconciliation-engine',
            database: databaseUp ? 'up' : 'down',
            uptime: process.uptime(),
            timestamp: new Date().toISOString()
        });
    });
};

export default healthRoutes;
