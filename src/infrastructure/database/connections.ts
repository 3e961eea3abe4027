// src/infrastructure/database/connections.ts
import { Pool, PoolConfig, types } from 'pg';
import { Environment } from '../../config/environment';
import { DatabaseException } from '../../shared/exceptions/infrastructure.exception';
import { logger } from '../monitoring/logger.service';

const DATE_OID = 1082;

// DATE columns stay calendar strings; the default parser shifts them through the local time zone
types.setTypeParser(DATE_OID, (value: string) => value);

export const getPostgresConfig = (env: Environment): PoolConfig => ({
    host: env.POSTGRES_HOST,
    port: env.POSTGRES_PORT,
    database: env.POSTGRES_DB,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    ssl: env.POSTGRES_SSL ? { rejectUnauthorized: false } : false,
    max: env.POSTGRES_MAX_CONNECTIONS,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: env.POSTGRES_STATEMENT_TIMEOUT,
    application_name: 'bank-reconciliation-engine'
});

/**
 * Creates the pool and checks that the server answers.
 */
export async function connectPostgreSQL(env: Environment): Promise<Pool> {
    const config = getPostgresConfig(env);
    const pool = new Pool(config);

    pool.on('error', (error) => {
        logger.error('Idle PostgreSQL client error', error);
    });

    try {
        const client = await pool.connect();
        try {
            const result = await client.query<{ version: string }>('SELECT version() AS version');
            logger.info('PostgreSQL connected', {
                host: config.host,
                database: config.database,
                version: result.rows[0]?.version.split(' ')[1]
            });
        } finally {
            client.release();
        }
        return pool;
    } catch (error) {
        logger.error('Failed to connect to PostgreSQL', error instanceof Error ? error : undefined, {
            host: config.host,
            port: config.port,
            database: config.database
        });
        await pool.end();
        throw DatabaseException.fromError('connect', error);
    }
}

export async function disconnectPostgreSQL(pool: Pool): Promise<void> {
    await pool.end();
    logger.info('PostgreSQL pool closed');
}
