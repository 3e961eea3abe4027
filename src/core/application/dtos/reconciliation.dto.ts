// src/core/application/dtos/reconciliation.dto.ts
import { z } from 'zod';
import { DateUtil } from '../../../shared/types/date.util';

const id = z.string().trim().min(1, 'Id is required').max(64, 'Id too long');

export const isoDateSchema = z.string()
    .refine(value => DateUtil.isValidIsoDate(value), { message: 'Date must be a valid YYYY-MM-DD calendar date' });

// Float error in value * 100 grows with magnitude, so the slack is relative.
function hasWholeCents(value: number): boolean {
    const scaled = value * 100;
    return Math.abs(scaled - Math.round(scaled)) <= Math.max(1e-6, Math.abs(scaled) * Number.EPSILON * 4);
}

export const amountSchema = z.number({ invalid_type_error: 'Amount must be a number' })
    .finite('Amount must be finite')
    .refine(hasWholeCents, {
        message: 'Amount can have at most 2 decimal places'
    })
    .refine(value => Math.abs(value) < 1e13, { message: 'Amount too large' });

const notes = z.string().max(2000, 'Notes too long').nullable().optional();

const uniqueIds = (field: string) => z.array(id)
    .min(1, `At least one ${field} transaction must be selected`)
    .max(500, 'Too many transactions in one selection')
    .refine(ids => new Set(ids).size === ids.length, { message: 'Duplicate transaction ids in selection' });

export const getOrCreateDraftSchema = z.object({
    bankAccountId: id,
    statementDate: isoDateSchema,
    statementEndingBalance: amountSchema,
    actorId: id,
    notes
});

export const matchSchema = z.object({
    draftId: id,
    statementTransactionIds: uniqueIds('statement'),
    systemTransactionIds: uniqueIds('system'),
    statementDate: isoDateSchema,
    actorId: id
}).refine(
    command => !command.statementTransactionIds.some(txId => command.systemTransactionIds.includes(txId)),
    { message: 'A transaction cannot appear on both sides of a match', path: ['systemTransactionIds'] }
);

export const previewSelectionSchema = z.object({
    draftId: id,
    statementTransactionIds: z.array(id),
    systemTransactionIds: z.array(id)
});

export const unmatchSchema = z.object({
    transactionIds: z.array(id)
        .min(1, 'At least one transaction must be selected')
        .max(1000, 'Too many transactions in one request')
        .refine(ids => new Set(ids).size === ids.length, { message: 'Duplicate transaction ids' }),
    actorId: id
});

export const finalizeSchema = z.object({
    draftId: id,
    statementEndingBalance: amountSchema,
    bookBalance: amountSchema,
    difference: amountSchema,
    actorId: id,
    notes
});

export const listHistorySchema = z.object({
    bankAccountId: id,
    page: z.number().int().min(1, 'Page must be at least 1').default(1),
    pageSize: z.number().int().min(1, 'Page size must be at least 1').default(20)
});

export const bookStatementItemSchema = z.object({
    draftId: id,
    statementTransactionId: id,
    contraGlAccountId: id,
    actorId: id,
    description: z.string().trim().min(1).max(200, 'Description too long').optional()
});

export const reconciliationIdSchema = z.object({
    reconciliationId: id
});

export type GetOrCreateDraftCommand = z.input<typeof getOrCreateDraftSchema>;
export type MatchCommand = z.input<typeof matchSchema>;
export type PreviewSelectionQuery = z.input<typeof previewSelectionSchema>;
export type UnmatchCommand = z.input<typeof unmatchSchema>;
export type FinalizeCommand = z.input<typeof finalizeSchema>;
export type ListHistoryQuery = z.input<typeof listHistorySchema>;
export type BookStatementItemCommand = z.input<typeof bookStatementItemSchema>;

export type ValidGetOrCreateDraftCommand = z.output<typeof getOrCreateDraftSchema>;
export type ValidMatchCommand = z.output<typeof matchSchema>;
export type ValidUnmatchCommand = z.output<typeof unmatchSchema>;
export type ValidFinalizeCommand = z.output<typeof finalizeSchema>;
export type ValidListHistoryQuery = z.output<typeof listHistorySchema>;
export type ValidBookStatementItemCommand = z.output<typeof bookStatementItemSchema>;
