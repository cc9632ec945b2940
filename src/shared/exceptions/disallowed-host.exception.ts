// src/shared/exceptions/disallowed-host.exception.ts
import { BaseException } from './base.exception';

export class DisallowedHostException extends BaseException {
    constructor(host: string) {
        super(`Invalid HTTP_HOST header: '${host}'.`, 'DISALLOWED_HOST', 400);
    }
}
