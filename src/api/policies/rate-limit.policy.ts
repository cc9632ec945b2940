// src/api/policies/rate-limit.policy.ts
import { FastifyInstance, FastifyRequest } from 'fastify';
import type { RateLimitOptions } from '@fastify/rate-limit';
import { Rate } from '../../shared/utils/rate.util';
import { RateLimitExceededException } from '../../shared/exceptions/rate-limit.exception';
import { logger } from '../../infrastructure/monitoring/logger.service';

type QuotaHook = ReturnType<FastifyInstance['rateLimit']>;

export interface RateLimitQuotas {
    /** Authenticated callers, keyed by user id. */
    user: QuotaHook;
    /** Anonymous clients, keyed by IP address. */
    anon: QuotaHook;
}

export function userQuotaKey(request: FastifyRequest): string {
    return request.user ? `user:${request.user.id}` : `anon:${request.ip}`;
}

export function anonQuotaKey(request: FastifyRequest): string {
    return `anon:${request.ip}`;
}

/**
 * Builds the two quota hooks. Each hook owns one counter store, so a hook
 * attached to several routes shares one budget across them.
 * Requires @fastify/rate-limit registered with `global: false`.
 */
export function createRateLimitQuotas(
    fastify: FastifyInstance,
    rates: { user: Rate; anon: Rate }
): RateLimitQuotas {
    const build = (scope: 'user' | 'anon', rate: Rate, keyGenerator: (request: FastifyRequest) => string) => {
        const options: RateLimitOptions = {
            max: rate.max,
            timeWindow: rate.timeWindow,
            keyGenerator,
            onExceeded: (request, key) => {
                logger.security('Rate limit exceeded', { scope, key, path: request.url });
            },
            errorResponseBuilder: (_request, context) => new RateLimitExceededException(context.ttl)
        };
        return fastify.rateLimit(options);
    };

    return {
        user: build('user', rates.user, userQuotaKey),
        anon: build('anon', rates.anon, anonQuotaKey)
    };
}
