// src/infrastructure/database/postgres/repositories/base.repository.ts
import { PoolClient, QueryResult, QueryResultRow } from 'pg';
import { IRepository } from '../../../../core/domain/services/unit-of-work.service';
import { DatabaseException } from '../../../../shared/exceptions/infrastructure.exception';
import { logger } from '../../../monitoring/logger.service';

/**
 * Connection handling shared by the PostgreSQL repositories. The unit of work
 * hands in the client; queries outside it fail fast.
 */
export abstract class PostgresRepository implements IRepository {
    private connection: PoolClient | null = null;

    protected abstract readonly name: string;

    setConnection(connection: PoolClient): void {
        this.connection = connection;
    }

    clearConnection(): void {
        this.connection = null;
    }

    protected getConnection(): PoolClient {
        if (!this.connection) {
            throw new DatabaseException(
                `No database connection available. ${this.name} must be used within a Unit of Work.`
            );
        }
        return this.connection;
    }

    protected async query<R extends QueryResultRow>(operation: string, text: string, values: unknown[] = []): Promise<QueryResult<R>> {
        const client = this.getConnection();
        const startedAt = Date.now();

        try {
            const result = await client.query<R>(text, values);
            logger.database(`${this.name}.${operation}`, {
                rowCount: result.rowCount,
                duration: Date.now() - startedAt
            });
            return result;
        } catch (error) {
            logger.error(`${this.name}.${operation} failed`, error instanceof Error ? error : undefined);
            throw DatabaseException.fromError(`${this.name}.${operation}`, error);
        }
    }
}
