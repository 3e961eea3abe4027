// src/infrastructure/database/postgres/schema.ts
import { Pool } from 'pg';
import { logger } from '../../monitoring/logger.service';

/**
 * Tables owned by the reconciliation engine plus the slices of the ledger and
 * bank account master data it reads and writes. Every statement is re-runnable.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
    `CREATE TABLE IF NOT EXISTS bank_accounts (
        id VARCHAR(64) PRIMARY KEY,
        name VARCHAR(120) NOT NULL,
        gl_account_id VARCHAR(64) NOT NULL,
        currency_code CHAR(3) NOT NULL DEFAULT 'USD',
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        last_reconciled_date DATE,
        last_reconciled_balance NUMERIC(15, 2),
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`,

    `CREATE TABLE IF NOT EXISTS journal_entries (
        id VARCHAR(64) PRIMARY KEY,
        entry_date DATE NOT NULL,
        description VARCHAR(255) NOT NULL,
        reference VARCHAR(100),
        status VARCHAR(16) NOT NULL DEFAULT 'Posted' CHECK (status IN ('Draft', 'Posted', 'Reversed')),
        created_by VARCHAR(64) NOT NULL,
        posted_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`,

    `CREATE TABLE IF NOT EXISTS ledger_entries (
        id VARCHAR(64) PRIMARY KEY,
        journal_entry_id VARCHAR(64) NOT NULL REFERENCES journal_entries(id),
        gl_account_id VARCHAR(64) NOT NULL,
        debit NUMERIC(15, 2) NOT NULL DEFAULT 0,
        credit NUMERIC(15, 2) NOT NULL DEFAULT 0,
        description VARCHAR(255),
        CONSTRAINT chk_ledger_one_side CHECK (debit >= 0 AND credit >= 0 AND (debit = 0) <> (credit = 0))
    )`,

    `CREATE INDEX IF NOT EXISTS idx_ledger_entries_account ON ledger_entries (gl_account_id)`,

    `CREATE TABLE IF NOT EXISTS bank_reconciliations (
        id VARCHAR(64) PRIMARY KEY,
        bank_account_id VARCHAR(64) NOT NULL REFERENCES bank_accounts(id),
        statement_date DATE NOT NULL,
        statement_ending_balance NUMERIC(15, 2) NOT NULL,
        calculated_book_balance NUMERIC(15, 2),
        difference NUMERIC(15, 2),
        status VARCHAR(16) NOT NULL DEFAULT 'Draft' CHECK (status IN ('Draft', 'Finalized')),
        notes TEXT,
        created_by VARCHAR(64) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        finalized_at TIMESTAMPTZ,
        CONSTRAINT chk_finalized_figures CHECK (
            status = 'Draft'
            OR (calculated_book_balance IS NOT NULL AND difference IS NOT NULL AND finalized_at IS NOT NULL)
        )
    )`,

    // at most one open draft per account and statement date
    `CREATE UNIQUE INDEX IF NOT EXISTS uq_bank_reconciliations_open_draft
        ON bank_reconciliations (bank_account_id, statement_date)
        WHERE status = 'Draft'`,

    `CREATE INDEX IF NOT EXISTS idx_bank_reconciliations_history
        ON bank_reconciliations (bank_account_id, statement_date DESC)
        WHERE status = 'Finalized'`,

    `CREATE TABLE IF NOT EXISTS bank_transactions (
        id VARCHAR(64) PRIMARY KEY,
        bank_account_id VARCHAR(64) NOT NULL REFERENCES bank_accounts(id),
        transaction_date DATE NOT NULL,
        amount NUMERIC(15, 2) NOT NULL,
        description VARCHAR(255) NOT NULL,
        reference VARCHAR(100),
        transaction_type VARCHAR(16) NOT NULL
            CHECK (transaction_type IN ('Deposit', 'Withdrawal', 'Interest', 'Fee', 'Transfer', 'Adjustment')),
        is_from_statement BOOLEAN NOT NULL,
        is_reconciled BOOLEAN NOT NULL DEFAULT FALSE,
        reconciled_date DATE,
        reconciliation_id VARCHAR(64) REFERENCES bank_reconciliations(id),
        journal_entry_id VARCHAR(64) REFERENCES journal_entries(id),
        created_by VARCHAR(64) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT chk_reconciled_link CHECK (is_reconciled = (reconciliation_id IS NOT NULL))
    )`,

    `CREATE INDEX IF NOT EXISTS idx_bank_transactions_pool
        ON bank_transactions (bank_account_id, is_reconciled, transaction_date)`,

    `CREATE INDEX IF NOT EXISTS idx_bank_transactions_reconciliation
        ON bank_transactions (reconciliation_id)
        WHERE reconciliation_id IS NOT NULL`
];

export async function applySchema(pool: Pool): Promise<void> {
    const client = await pool.connect();
    try {
        await client.query('BEGIN');
        for (const statement of SCHEMA_STATEMENTS) {
            await client.query(statement);
        }
        await client.query('COMMIT');
        logger.info('Database schema applied', { statements: SCHEMA_STATEMENTS.length });
    } catch (error) {
        await client.query('ROLLBACK');
        logger.error('Failed to apply database schema', error instanceof Error ? error : undefined);
        throw error;
    } finally {
        client.release();
    }
}
