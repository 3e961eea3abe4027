// src/infrastructure/database/postgres/repositories/bank-transaction.repository.ts
import { BankTransactionEntity, BankTransactionType } from '../../../../core/domain/entities/bank-transaction.entity';
import { BankTransactionRepository, LockOptions } from '../../../../core/domain/repositories/bank-transaction.repository';
import { Money } from '../../../../core/domain/value-objects/money.vo';
import { DatabaseException } from '../../../../shared/exceptions/infrastructure.exception';
import { IsoDate } from '../../../../shared/types/common.types';
import { PostgresRepository } from './base.repository';

export interface BankTransactionRow {
    id: string;
    bank_account_id: string;
    transaction_date: string;
    amount: string;
    currency_code: string;
    description: string;
    reference: string | null;
    transaction_type: string;
    is_from_statement: boolean;
    is_reconciled: boolean;
    reconciled_date: string | null;
    reconciliation_id: string | null;
    journal_entry_id: string | null;
    created_by: string;
    created_at: Date;
    updated_at: Date;
}

const TRANSACTION_TYPES: readonly string[] = Object.values(BankTransactionType);

function isTransactionType(value: string): value is BankTransactionType {
    return TRANSACTION_TYPES.includes(value);
}

// amounts carry the owning account's currency
const SELECT_COLUMNS = `
    bt.id, bt.bank_account_id, bt.transaction_date, bt.amount, ba.currency_code,
    bt.description, bt.reference, bt.transaction_type, bt.is_from_statement,
    bt.is_reconciled, bt.reconciled_date, bt.reconciliation_id, bt.journal_entry_id,
    bt.created_by, bt.created_at, bt.updated_at
`;

export class BankTransactionRepositoryPostgres extends PostgresRepository implements BankTransactionRepository {
    protected readonly name = 'BankTransactionRepository';

    async findByIds(ids: string[], options: LockOptions = {}): Promise<BankTransactionEntity[]> {
        if (ids.length === 0) {
            return [];
        }

        // fixed lock order keeps two claimants from deadlocking on overlapping selections
        const result = await this.query<BankTransactionRow>('findByIds', `
            SELECT ${SELECT_COLUMNS}
            FROM bank_transactions bt
            JOIN bank_accounts ba ON ba.id = bt.bank_account_id
            WHERE bt.id = ANY($1::varchar[])
            ORDER BY bt.id
            ${options.forUpdate ? 'FOR UPDATE OF bt' : ''}
        `, [ids]);

        return result.rows.map(row => this.mapRowToEntity(row));
    }

    async findUnreconciled(bankAccountId: string, asOf: IsoDate): Promise<BankTransactionEntity[]> {
        const result = await this.query<BankTransactionRow>('findUnreconciled', `
            SELECT ${SELECT_COLUMNS}
            FROM bank_transactions bt
            JOIN bank_accounts ba ON ba.id = bt.bank_account_id
            WHERE bt.bank_account_id = $1
              AND bt.is_reconciled = FALSE
              AND bt.transaction_date <= $2::date
            ORDER BY bt.transaction_date, bt.created_at, bt.id
        `, [bankAccountId, asOf]);

        return result.rows.map(row => this.mapRowToEntity(row));
    }

    async findByReconciliationId(reconciliationId: string): Promise<BankTransactionEntity[]> {
        const result = await this.query<BankTransactionRow>('findByReconciliationId', `
            SELECT ${SELECT_COLUMNS}
            FROM bank_transactions bt
            JOIN bank_accounts ba ON ba.id = bt.bank_account_id
            WHERE bt.reconciliation_id = $1
            ORDER BY bt.transaction_date, bt.created_at, bt.id
        `, [reconciliationId]);

        return result.rows.map(row => this.mapRowToEntity(row));
    }

    async create(transaction: BankTransactionEntity): Promise<BankTransactionEntity> {
        await this.query('create', `
            INSERT INTO bank_transactions (
                id, bank_account_id, transaction_date, amount, description, reference,
                transaction_type, is_from_statement, is_reconciled, reconciled_date,
                reconciliation_id, journal_entry_id, created_by, created_at, updated_at
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
        `, [
            transaction.id,
            transaction.bankAccountId,
            transaction.transactionDate,
            transaction.amount.toDecimalString(),
            transaction.description,
            transaction.reference,
            transaction.transactionType,
            transaction.isFromStatement,
            transaction.isReconciled,
            transaction.reconciledDate,
            transaction.reconciliationId,
            transaction.journalEntryId,
            transaction.createdBy,
            transaction.createdAt,
            transaction.updatedAt
        ]);

        return transaction;
    }

    /**
     * One statement for the whole batch, so a selection is claimed or released together.
     */
    async updateMatchState(transactions: BankTransactionEntity[]): Promise<void> {
        if (transactions.length === 0) {
            return;
        }

        const result = await this.query('updateMatchState', `
            UPDATE bank_transactions bt
            SET is_reconciled = data.is_reconciled,
                reconciliation_id = data.reconciliation_id,
                reconciled_date = data.reconciled_date,
                updated_at = data.updated_at
            FROM UNNEST($1::varchar[], $2::boolean[], $3::varchar[], $4::date[], $5::timestamptz[])
                AS data(id, is_reconciled, reconciliation_id, reconciled_date, updated_at)
            WHERE bt.id = data.id
        `, [
            transactions.map(tx => tx.id),
            transactions.map(tx => tx.isReconciled),
            transactions.map(tx => tx.reconciliationId),
            transactions.map(tx => tx.reconciledDate),
            transactions.map(tx => tx.updatedAt)
        ]);

        if (result.rowCount !== transactions.length) {
            throw new DatabaseException('Match state update touched an unexpected number of rows', {
                expected: transactions.length,
                actual: result.rowCount
            });
        }
    }

    private mapRowToEntity(row: BankTransactionRow): BankTransactionEntity {
        if (!isTransactionType(row.transaction_type)) {
            throw new DatabaseException(`Unknown bank transaction type '${row.transaction_type}'`, { id: row.id });
        }

        return new BankTransactionEntity({
            id: row.id,
            bankAccountId: row.bank_account_id,
            transactionDate: row.transaction_date,
            amount: Money.fromDecimalString(row.amount, row.currency_code),
            description: row.description,
            reference: row.reference,
            transactionType: row.transaction_type,
            isFromStatement: row.is_from_statement,
            isReconciled: row.is_reconciled,
            reconciledDate: row.reconciled_date,
            reconciliationId: row.reconciliation_id,
            journalEntryId: row.journal_entry_id,
            createdBy: row.created_by,
            createdAt: row.created_at,
            updatedAt: row.updated_at
        });
    }
}
