// src/shared/types/result.types.ts
import { BaseException } from '../exceptions/base.exception';
import { ERROR_CODES } from '../constants/error-codes';

export type FailureKind =
    | 'VALIDATION_ERROR'
    | 'UNBALANCED_SELECTION'
    | 'IMMUTABLE_RECORD'
    | 'NOT_BALANCED'
    | 'ALREADY_FINALIZED'
    | 'NOT_FOUND'
    | 'PERSISTENCE_ERROR';

export interface Failure {
    kind: FailureKind;
    code: string;
    message: string;
    details: Record<string, unknown>;
}

export type ReconciliationResult<T> =
    | { success: true; value: T }
    | { success: false; error: Failure };

const KIND_BY_CODE: Record<string, FailureKind> = {
    [ERROR_CODES.VALIDATION_ERROR]: 'VALIDATION_ERROR',
    [ERROR_CODES.BUSINESS_ERROR]: 'VALIDATION_ERROR',
    [ERROR_CODES.UNBALANCED_SELECTION]: 'UNBALANCED_SELECTION',
    [ERROR_CODES.IMMUTABLE_RECORD]: 'IMMUTABLE_RECORD',
    [ERROR_CODES.NOT_BALANCED]: 'NOT_BALANCED',
    [ERROR_CODES.ALREADY_FINALIZED]: 'ALREADY_FINALIZED',
    [ERROR_CODES.NOT_FOUND]: 'NOT_FOUND'
};

export function toFailure(exception: BaseException): Failure {
    return {
        // anything without a business mapping surfaces as a storage failure
        kind: KIND_BY_CODE[exception.code] ?? 'PERSISTENCE_ERROR',
        code: exception.code,
        message: exception.message,
        details: exception.details
    };
}

export const Result = {
    ok<T>(value: T): ReconciliationResult<T> {
        return { success: true, value };
    },

    fail<T>(exception: BaseException): ReconciliationResult<T> {
        return { success: false, error: toFailure(exception) };
    }
};
