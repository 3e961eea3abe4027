// src/infrastructure/database/postgres/repositories/journal-entry.repository.ts
import { v4 as uuidv4 } from 'uuid';
import { JournalEntryFactory, JournalEntryOptions, JournalLine } from '../../../../core/domain/repositories/collaborators';
import { Money } from '../../../../core/domain/value-objects/money.vo';
import { BusinessException } from '../../../../shared/exceptions/business.exception';
import { IsoDate } from '../../../../shared/types/common.types';
import { logger } from '../../../monitoring/logger.service';
import { PostgresRepository } from './base.repository';

/**
 * Validates that the lines form a postable double entry.
 */
export function assertBalancedLines(lines: JournalLine[]): void {
    if (lines.length < 2) {
        throw new BusinessException('Journal entry must have at least two lines');
    }

    const currency = lines[0]?.debit.currency ?? 'USD';
    for (const line of lines) {
        const oneSided = line.debit.isZero() !== line.credit.isZero();
        if (!oneSided || line.debit.isNegative() || line.credit.isNegative()) {
            throw new BusinessException(
                `Journal line for account ${line.glAccountId} must carry exactly one positive debit or credit`
            );
        }
    }

    const debits = Money.sum(lines.map(line => line.debit), currency);
    const credits = Money.sum(lines.map(line => line.credit), currency);
    if (!debits.equals(credits)) {
        throw new BusinessException(
            `Journal entry is not balanced: debits ${debits.toDecimalString()} credits ${credits.toDecimalString()}`
        );
    }
}

export class JournalEntryRepositoryPostgres extends PostgresRepository implements JournalEntryFactory {
    protected readonly name = 'JournalEntryRepository';

    async createAndPost(lines: JournalLine[], date: IsoDate, description: string, options: JournalEntryOptions): Promise<string> {
        assertBalancedLines(lines);

        const journalEntryId = uuidv4();

        await this.query('insertJournalEntry', `
            INSERT INTO journal_entries (id, entry_date, description, reference, status, created_by, posted_at)
            VALUES ($1, $2, $3, $4, 'Posted', $5, NOW())
        `, [journalEntryId, date, description, options.reference ?? null, options.actorId]);

        for (const line of lines) {
            await this.query('insertLedgerEntry', `
                INSERT INTO ledger_entries (id, journal_entry_id, gl_account_id, debit, credit, description)
                VALUES ($1, $2, $3, $4, $5, $6)
            `, [
                uuidv4(),
                journalEntryId,
                line.glAccountId,
                line.debit.toDecimalString(),
                line.credit.toDecimalString(),
                line.description
            ]);
        }

        logger.info('Journal entry posted', {
            journalEntryId,
            entryDate: date,
            linesCount: lines.length
        });

        return journalEntryId;
    }
}
