// src/infrastructure/database/postgres/repositories/bank-account.repository.ts
import { BankAccountDirectory, BankAccountInfo } from '../../../../core/domain/repositories/collaborators';
import { Money } from '../../../../core/domain/value-objects/money.vo';
import { NotFoundException } from '../../../../shared/exceptions/not-found.exception';
import { IsoDate } from '../../../../shared/types/common.types';
import { PostgresRepository } from './base.repository';

export interface BankAccountRow {
    id: string;
    name: string;
    gl_account_id: string;
    currency_code: string;
    is_active: boolean;
    last_reconciled_date: string | null;
    last_reconciled_balance: string | null;
}

export class BankAccountRepositoryPostgres extends PostgresRepository implements BankAccountDirectory {
    protected readonly name = 'BankAccountRepository';

    async getById(bankAccountId: string): Promise<BankAccountInfo | null> {
        const result = await this.query<BankAccountRow>('getById', `
            SELECT id, name, gl_account_id, currency_code, is_active,
                   last_reconciled_date, last_reconciled_balance
            FROM bank_accounts
            WHERE id = $1
        `, [bankAccountId]);

        const [row] = result.rows;
        if (!row) {
            return null;
        }

        return {
            id: row.id,
            name: row.name,
            glAccountId: row.gl_account_id,
            currencyCode: row.currency_code,
            isActive: row.is_active,
            lastReconciledDate: row.last_reconciled_date,
            lastReconciledBalance: row.last_reconciled_balance === null
                ? null
                : Money.fromDecimalString(row.last_reconciled_balance, row.currency_code)
        };
    }

    async recordReconciled(bankAccountId: string, statementDate: IsoDate, statementEndingBalance: Money): Promise<void> {
        const result = await this.query('recordReconciled', `
            UPDATE bank_accounts
            SET last_reconciled_date = $2,
                last_reconciled_balance = $3,
                updated_at = NOW()
            WHERE id = $1
        `, [bankAccountId, statementDate, statementEndingBalance.toDecimalString()]);

        if (result.rowCount !== 1) {
            throw new NotFoundException('BankAccount', bankAccountId);
        }
    }
}
