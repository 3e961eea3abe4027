// src/shared/constants/error-codes.ts
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    NOT_FOUND: 'NOT_FOUND',
    BUSINESS_ERROR: 'BUSINESS_ERROR',
    UNBALANCED_SELECTION: 'UNBALANCED_SELECTION',
    IMMUTABLE_RECORD: 'IMMUTABLE_RECORD',
    NOT_BALANCED: 'NOT_BALANCED',
    ALREADY_FINALIZED: 'ALREADY_FINALIZED',
    INFRASTRUCTURE_ERROR: 'INFRASTRUCTURE_ERROR',
    PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR'
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];
