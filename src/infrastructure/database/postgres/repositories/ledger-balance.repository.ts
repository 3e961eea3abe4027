// src/infrastructure/database/postgres/repositories/ledger-balance.repository.ts
import { BalanceOracle } from '../../../../core/domain/repositories/collaborators';
import { Money } from '../../../../core/domain/value-objects/money.vo';
import { IsoDate } from '../../../../shared/types/common.types';
import { PostgresRepository } from './base.repository';

/**
 * GL balances from posted journal lines. Debit-normal: debits minus credits.
 */
export class LedgerBalanceRepositoryPostgres extends PostgresRepository implements BalanceOracle {
    protected readonly name = 'LedgerBalanceRepository';

    async getAccountBalance(glAccountId: string, asOf: IsoDate, currency: string): Promise<Money> {
        const result = await this.query<{ balance: string }>('getAccountBalance', `
            SELECT COALESCE(SUM(le.debit - le.credit), 0)::text AS balance
            FROM ledger_entries le
            JOIN journal_entries je ON je.id = le.journal_entry_id
            WHERE le.gl_account_id = $1
              AND je.status = 'Posted'
              AND je.entry_date <= $2::date
        `, [glAccountId, asOf]);

        return Money.fromDecimalString(result.rows[0]?.balance ?? '0', currency);
    }
}
