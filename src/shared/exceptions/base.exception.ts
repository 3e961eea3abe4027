// src/shared/exceptions/base.exception.ts
export type ExceptionDetails = Record<string, unknown>;

export abstract class BaseException extends Error {
    public readonly code: string;
    public readonly statusCode: number;
    public readonly details: ExceptionDetails;

    constructor(
        message: string,
        code: string,
        statusCode: number,
        details: ExceptionDetails = {}
    ) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.statusCode = statusCode;
        this.details = details;

        // Maintains proper stack trace for where our error was thrown
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): { name: string; code: string; message: string; details: ExceptionDetails } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details
        };
    }
}
