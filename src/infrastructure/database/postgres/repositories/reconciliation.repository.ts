// src/infrastructure/database/postgres/repositories/reconciliation.repository.ts
import { ReconciliationEntity, ReconciliationStatus } from '../../../../core/domain/entities/reconciliation.entity';
import { LockOptions } from '../../../../core/domain/repositories/bank-transaction.repository';
import { ReconciliationPage, ReconciliationRepository } from '../../../../core/domain/repositories/reconciliation.repository';
import { Money } from '../../../../core/domain/value-objects/money.vo';
import { DatabaseException } from '../../../../shared/exceptions/infrastructure.exception';
import { IsoDate, PaginationOptions } from '../../../../shared/types/common.types';
import { PostgresRepository } from './base.repository';

export interface ReconciliationRow {
    id: string;
    bank_account_id: string;
    statement_date: string;
    statement_ending_balance: string;
    calculated_book_balance: string | null;
    difference: string | null;
    currency_code: string;
    status: string;
    notes: string | null;
    created_by: string;
    created_at: Date;
    updated_at: Date;
    finalized_at: Date | null;
}

const SELECT_COLUMNS = `
    br.id, br.bank_account_id, br.statement_date, br.statement_ending_balance,
    br.calculated_book_balance, br.difference, ba.currency_code, br.status, br.notes,
    br.created_by, br.created_at, br.updated_at, br.finalized_at
`;

function toStatus(value: string, id: string): ReconciliationStatus {
    switch (value) {
        case ReconciliationStatus.DRAFT:
            return ReconciliationStatus.DRAFT;
        case ReconciliationStatus.FINALIZED:
            return ReconciliationStatus.FINALIZED;
        default:
            throw new DatabaseException(`Unknown reconciliation status '${value}'`, { id });
    }
}

export class ReconciliationRepositoryPostgres extends PostgresRepository implements ReconciliationRepository {
    protected readonly name = 'ReconciliationRepository';

    async findById(id: string, options: LockOptions = {}): Promise<ReconciliationEntity | null> {
        const result = await this.query<ReconciliationRow>('findById', `
            SELECT ${SELECT_COLUMNS}
            FROM bank_reconciliations br
            JOIN bank_accounts ba ON ba.id = br.bank_account_id
            WHERE br.id = $1
            ${options.forUpdate ? 'FOR UPDATE OF br' : ''}
        `, [id]);

        const [row] = result.rows;
        return row ? this.mapRowToEntity(row) : null;
    }

    async findOpenDraft(bankAccountId: string, statementDate: IsoDate, options: LockOptions = {}): Promise<ReconciliationEntity | null> {
        const result = await this.query<ReconciliationRow>('findOpenDraft', `
            SELECT ${SELECT_COLUMNS}
            FROM bank_reconciliations br
            JOIN bank_accounts ba ON ba.id = br.bank_account_id
            WHERE br.bank_account_id = $1
              AND br.statement_date = $2::date
              AND br.status = $3
            ${options.forUpdate ? 'FOR UPDATE OF br' : ''}
        `, [bankAccountId, statementDate, ReconciliationStatus.DRAFT]);

        const [row] = result.rows;
        return row ? this.mapRowToEntity(row) : null;
    }

    /**
     * Relies on the partial unique index over open drafts: a concurrent insert
     * waits for the other transaction and then inserts nothing.
     */
    async insertDraft(draft: ReconciliationEntity): Promise<boolean> {
        const result = await this.query('insertDraft', `
            INSERT INTO bank_reconciliations (
                id, bank_account_id, statement_date, statement_ending_balance,
                status, notes, created_by, created_at, updated_at
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
            ON CONFLICT (bank_account_id, statement_date) WHERE status = 'Draft' DO NOTHING
        `, [
            draft.id,
            draft.bankAccountId,
            draft.statementDate,
            draft.statementEndingBalance.toDecimalString(),
            draft.status,
            draft.notes,
            draft.createdBy,
            draft.createdAt,
            draft.updatedAt
        ]);

        return result.rowCount === 1;
    }

    async save(reconciliation: ReconciliationEntity): Promise<void> {
        const result = await this.query('save', `
            UPDATE bank_reconciliations
            SET statement_ending_balance = $2,
                calculated_book_balance = $3,
                difference = $4,
                status = $5,
                notes = $6,
                updated_at = $7,
                finalized_at = $8
            WHERE id = $1
        `, [
            reconciliation.id,
            reconciliation.statementEndingBalance.toDecimalString(),
            reconciliation.calculatedBookBalance?.toDecimalString() ?? null,
            reconciliation.difference?.toDecimalString() ?? null,
            reconciliation.status,
            reconciliation.notes,
            reconciliation.updatedAt,
            reconciliation.finalizedAt
        ]);

        if (result.rowCount !== 1) {
            throw new DatabaseException(`Reconciliation ${reconciliation.id} could not be updated`, { id: reconciliation.id });
        }
    }

    async findFinalizedByBankAccount(bankAccountId: string, pagination: PaginationOptions): Promise<ReconciliationPage> {
        const offset = (pagination.page - 1) * pagination.pageSize;

        const [countResult, pageResult] = await Promise.all([
            this.query<{ total: string }>('countFinalized', `
                SELECT COUNT(*) AS total
                FROM bank_reconciliations
                WHERE bank_account_id = $1 AND status = $2
            `, [bankAccountId, ReconciliationStatus.FINALIZED]),
            this.query<ReconciliationRow>('findFinalizedByBankAccount', `
                SELECT ${SELECT_COLUMNS}
                FROM bank_reconciliations br
                JOIN bank_accounts ba ON ba.id = br.bank_account_id
                WHERE br.bank_account_id = $1 AND br.status = $2
                ORDER BY br.statement_date DESC, br.finalized_at DESC
                LIMIT $3 OFFSET $4
            `, [bankAccountId, ReconciliationStatus.FINALIZED, pagination.pageSize, offset])
        ]);

        return {
            items: pageResult.rows.map(row => this.mapRowToEntity(row)),
            total: parseInt(countResult.rows[0]?.total ?? '0', 10)
        };
    }

    private mapRowToEntity(row: ReconciliationRow): ReconciliationEntity {
        const currency = row.currency_code;
        return new ReconciliationEntity({
            id: row.id,
            bankAccountId: row.bank_account_id,
            statementDate: row.statement_date,
            statementEndingBalance: Money.fromDecimalString(row.statement_ending_balance, currency),
            calculatedBookBalance: row.calculated_book_balance === null
                ? null
                : Money.fromDecimalString(row.calculated_book_balance, currency),
            difference: row.difference === null ? null : Money.fromDecimalString(row.difference, currency),
            status: toStatus(row.status, row.id),
            notes: row.notes,
            createdBy: row.created_by,
            createdAt: row.created_at,
            updatedAt: row.updated_at,
            finalizedAt: row.finalized_at
        });
    }
}
