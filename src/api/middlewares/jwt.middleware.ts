// src/api/middlewares/jwt.middleware.ts
import { FastifyRequest } from 'fastify';
import { AuthService } from '../../core/application/services/auth.service';
import { UserRef } from '../../core/domain/entities/user.entity';
import { UnauthorizedException } from '../../shared/exceptions/unauthorized.exception';
import { logger } from '../../infrastructure/monitoring/logger.service';

declare module 'fastify' {
    interface FastifyRequest {
        user?: UserRef;
    }
}

export class JWTMiddleware {
    constructor(private readonly authService: AuthService) {}

    /**
     * onRequest hook: requires a valid Bearer access token and attaches the
     * caller to `request.user`. Runs before throttling, body parsing and
     * validation.
     */
    authenticate = async (request: FastifyRequest): Promise<void> => {
        const header = request.headers.authorization;
        if (!header) {
            throw new UnauthorizedException();
        }

        const token = AuthService.extractTokenFromHeader(header);
        if (!token) {
            throw new UnauthorizedException('Authorization header must contain a Bearer token.');
        }

        try {
            request.user = await this.authService.authenticate(token);
        } catch (error) {
            logger.security('JWT authentication failed', {
                path: request.url,
                method: request.method,
                ip: request.ip
            });
            throw error;
        }

        logger.debug('JWT authentication successful', {
            userId: request.user.id,
            path: request.url,
            method: request.method
        });
    };
}

/**
 * The caller attached by `JWTMiddleware.authenticate`.
 */
export function requireCaller(request: FastifyRequest): UserRef {
    if (!request.user) {
        throw new UnauthorizedException();
    }
    return request.user;
}
