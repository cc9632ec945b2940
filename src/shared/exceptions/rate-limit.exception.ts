// src/shared/exceptions/rate-limit.exception.ts
import { BaseException } from './base.exception';

export class RateLimitExceededException extends BaseException {
    constructor(retryAfterMs: number) {
        const retryAfter = Math.max(1, Math.ceil(retryAfterMs / 1000));
        super(`Request was throttled. Expected available in ${retryAfter} seconds.`, 'RATE_LIMIT_EXCEEDED', 429);
    }
}
