// src/api/validators/reconciliation.validator.ts
import { z } from 'zod';

/**
 * Request shapes accepted over HTTP. Business rules (dates, amounts, selection
 * sizes) are enforced again by the application service.
 */

export const actorHeadersSchema = z.object({
    'x-actor-id': z.string({ required_error: 'x-actor-id header is required' })
        .trim()
        .min(1, 'x-actor-id header is required')
        .max(64, 'x-actor-id header too long')
});

export const reconciliationParamsSchema = z.object({
    id: z.string().min(1)
});

export const statementItemParamsSchema = z.object({
    id: z.string().min(1),
    transactionId: z.string().min(1)
});

export const historyParamsSchema = z.object({
    bankAccountId: z.string().min(1)
});

const pageNumber = z.string()
    .regex(/^\d+$/, 'Must be a positive integer')
    .transform(value => parseInt(value, 10));

export const historyQuerySchema = z.object({
    page: pageNumber.optional(),
    pageSize: pageNumber.optional()
});

export const draftBodySchema = z.object({
    bankAccountId: z.string(),
    statementDate: z.string(),
    statementEndingBalance: z.number(),
    notes: z.string().nullable().optional()
});

export const matchBodySchema = z.object({
    statementTransactionIds: z.array(z.string()),
    systemTransactionIds: z.array(z.string()),
    statementDate: z.string()
});

export const previewBodySchema = z.object({
    statementTransactionIds: z.array(z.string()).default([]),
    systemTransactionIds: z.array(z.string()).default([])
});

export const unmatchBodySchema = z.object({
    transactionIds: z.array(z.string())
});

export const finalizeBodySchema = z.object({
    statementEndingBalance: z.number(),
    bookBalance: z.number(),
    difference: z.number(),
    notes: z.string().nullable().optional()
});

export const bookBodySchema = z.object({
    contraGlAccountId: z.string(),
    description: z.string().optional()
});
