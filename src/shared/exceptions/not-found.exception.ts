// src/shared/exceptions/not-found.exception.ts
import { BaseException } from './base.exception';
import { HTTP_STATUS } from '../constants/status-codes';
import { ERROR_CODES } from '../constants/error-codes';

export class NotFoundException extends BaseException {
    constructor(resource: string, id: string) {
        super(`${resource} ${id} not found`, ERROR_CODES.NOT_FOUND, HTTP_STATUS.NOT_FOUND, { resource, id });
    }
}
