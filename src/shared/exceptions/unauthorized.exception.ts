// src/shared/exceptions/unauthorized.exception.ts
import { BaseException } from './base.exception';

export class UnauthorizedException extends BaseException {
    constructor(message: string = 'Authentication credentials were not provided.') {
        super(message, 'UNAUTHORIZED', 401);
    }
}
