// src/shared/exceptions/business.exception.ts
import { BaseException, ExceptionDetails } from './base.exception';
import { HTTP_STATUS } from '../constants/status-codes';
import { ERROR_CODES } from '../constants/error-codes';

export class BusinessException extends BaseException {
    constructor(
        message: string,
        code: string = ERROR_CODES.BUSINESS_ERROR,
        statusCode: number = HTTP_STATUS.UNPROCESSABLE_ENTITY,
        details: ExceptionDetails = {}
    ) {
        super(message, code, statusCode, details);
    }
}

export class UnbalancedSelectionException extends BusinessException {
    constructor(
        public readonly statementSum: number,
        public readonly systemSum: number,
        public readonly tolerance: number
    ) {
        super(
            `Selected statement items total ${statementSum.toFixed(2)} does not match selected system items total ${systemSum.toFixed(2)}`,
            ERROR_CODES.UNBALANCED_SELECTION,
            HTTP_STATUS.UNPROCESSABLE_ENTITY,
            {
                statementSum,
                systemSum,
                difference: Math.round((statementSum - systemSum) * 100) / 100,
                tolerance
            }
        );
    }
}

export class ImmutableRecordException extends BusinessException {
    constructor(
        public readonly recordId: string,
        public readonly reconciliationId: string,
        reason = 'belongs to a finalized reconciliation'
    ) {
        super(
            `Record ${recordId} ${reason} (${reconciliationId}) and cannot be changed`,
            ERROR_CODES.IMMUTABLE_RECORD,
            HTTP_STATUS.CONFLICT,
            { recordId, reconciliationId }
        );
    }
}

export class NotBalancedException extends BusinessException {
    constructor(
        public readonly difference: number,
        public readonly tolerance: number,
        context: ExceptionDetails = {}
    ) {
        super(
            `Reconciliation difference ${difference.toFixed(2)} exceeds tolerance ${tolerance.toFixed(2)}`,
            ERROR_CODES.NOT_BALANCED,
            HTTP_STATUS.UNPROCESSABLE_ENTITY,
            { ...context, difference, tolerance }
        );
    }
}

export class AlreadyFinalizedException extends BusinessException {
    constructor(
        public readonly reconciliationId: string,
        public readonly finalizedAt: Date | null
    ) {
        super(
            `Reconciliation ${reconciliationId} is already finalized`,
            ERROR_CODES.ALREADY_FINALIZED,
            HTTP_STATUS.CONFLICT,
            { reconciliationId, finalizedAt: finalizedAt?.toISOString() ?? null }
        );
    }
}
