// src/api/middlewares/security.middleware.ts
import { FastifyReply, FastifyRequest } from 'fastify';
import { DisallowedHostException } from '../../shared/exceptions/disallowed-host.exception';
import { logger } from '../../infrastructure/monitoring/logger.service';

export interface SecurityMiddlewareOptions {
    /** Empty accepts any Host header. */
    allowedHosts: string[];
    sslRedirect: boolean;
}

/**
 * Host without its port, lower-cased. IPv6 literals keep their brackets.
 */
export function hostName(host: string): string {
    const match = /^(\[[^\]]*\]|[^:]*)(?::\d+)?$/.exec(host.trim().toLowerCase());
    return match ? match[1] : '';
}

export function isAllowedHost(host: string, allowedHosts: string[]): boolean {
    if (allowedHosts.length === 0) {
        return true;
    }
    const name = hostName(host);
    if (!name) {
        return false;
    }
    return allowedHosts.some(pattern =>
        pattern === '*'
        || pattern === name
        || (pattern.startsWith('.') && (name.endsWith(pattern) || name === pattern.slice(1)))
    );
}

export class SecurityMiddleware {
    constructor(private readonly options: SecurityMiddlewareOptions) {}

    /**
     * onRequest hook: rejects unknown Host headers, then sends plain HTTP
     * requests to their https:// URL when the redirect is enabled. A proxy
     * terminating TLS marks the request with `X-Forwarded-Proto: https`.
     */
    guard = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
        const host = request.headers.host ?? '';

        if (!isAllowedHost(host, this.options.allowedHosts)) {
            logger.security('Request with disallowed host', { host, ip: request.ip, path: request.url });
            throw new DisallowedHostException(host);
        }

        if (this.options.sslRedirect && !this.isSecure(request)) {
            return reply.redirect(301, `https://${host}${request.url}`);
        }
        return undefined;
    };

    private isSecure(request: FastifyRequest): boolean {
        return request.protocol === 'https' || request.headers['x-forwarded-proto'] === 'https';
    }
}
