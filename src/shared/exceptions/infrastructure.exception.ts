// src/shared/exceptions/infrastructure.exception.ts
import { BaseException, ExceptionDetails } from './base.exception';
import { HTTP_STATUS } from '../constants/status-codes';
import { ERROR_CODES } from '../constants/error-codes';

export class InfrastructureException extends BaseException {
    constructor(
        message: string,
        code: string = ERROR_CODES.INFRASTRUCTURE_ERROR,
        statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
        details: ExceptionDetails = {}
    ) {
        super(message, code, statusCode, details);
    }
}

/**
 * Storage failure. The enclosing unit of work has been rolled back by the time this is raised.
 */
export class DatabaseException extends InfrastructureException {
    constructor(message: string, details: ExceptionDetails = {}) {
        super(message, ERROR_CODES.PERSISTENCE_ERROR, HTTP_STATUS.INTERNAL_ERROR, details);
    }

    static fromError(operation: string, error: unknown): DatabaseException {
        if (error instanceof DatabaseException) {
            return error;
        }
        const message = error instanceof Error ? error.message : String(error);
        const sqlState = typeof error === 'object' && error !== null && 'code' in error
            ? String(error.code)
            : undefined;
        return new DatabaseException(`${operation} failed: ${message}`, { operation, sqlState });
    }
}

export class ConfigurationException extends InfrastructureException {
    constructor(message: string, details: ExceptionDetails = {}) {
        super(message, ERROR_CODES.CONFIGURATION_ERROR, HTTP_STATUS.INTERNAL_ERROR, details);
    }
}
