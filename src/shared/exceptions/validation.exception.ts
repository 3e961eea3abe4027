// src/shared/exceptions/validation.exception.ts
import { BaseException } from './base.exception';
import { HTTP_STATUS } from '../constants/status-codes';
import { ERROR_CODES } from '../constants/error-codes';

export interface FieldError {
    field: string;
    message: string;
    value?: unknown;
}

export class ValidationException extends BaseException {
    public readonly validationErrors: FieldError[];

    constructor(message: string, validationErrors: FieldError[] = []) {
        super(message, ERROR_CODES.VALIDATION_ERROR, HTTP_STATUS.BAD_REQUEST, { errors: validationErrors });
        this.validationErrors = validationErrors;
    }

    static forField(field: string, message: string, value?: unknown): ValidationException {
        return new ValidationException(message, [{ field, message, value }]);
    }
}
