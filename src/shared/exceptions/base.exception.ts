// src/shared/exceptions/base.exception.ts
export abstract class BaseException extends Error {
    public readonly code: string;
    public readonly statusCode: number;
    public readonly details?: unknown;

    constructor(
        message: string,
        code: string,
        statusCode: number,
        details?: unknown
    ) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.statusCode = statusCode;
        this.details = details;

        Error.captureStackTrace(this, this.constructor);
    }

    toJSON() {
        return {
            success: false,
            message: this.message,
            error: this.code,
            ...(this.details !== undefined && { details: this.details })
        };
    }
}
