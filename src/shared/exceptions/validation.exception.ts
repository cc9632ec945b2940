// src/shared/exceptions/validation.exception.ts
import { BaseException } from './base.exception';

export type FieldErrors = Record<string, string[]>;

export class ValidationException extends BaseException {
    public readonly fieldErrors: FieldErrors;

    constructor(fieldErrors: FieldErrors, message: string = 'Validation error') {
        super(message, 'VALIDATION_ERROR', 400, fieldErrors);
        this.fieldErrors = fieldErrors;
    }
}
