// src/shared/exceptions/conflict.exception.ts
import { BaseException } from './base.exception';

export class ConflictException extends BaseException {
    constructor(message: string) {
        super(message, 'CONFLICT', 409);
    }
}
