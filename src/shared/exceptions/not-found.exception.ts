// src/shared/exceptions/not-found.exception.ts
import { BaseException } from './base.exception';

/**
 * Raised both for records that do not exist and for records owned by someone
 * else. Callers cannot tell the two apart.
 */
export class NotFoundException extends BaseException {
    constructor(message: string = 'Not found.') {
        super(message, 'NOT_FOUND', 404);
    }
}
