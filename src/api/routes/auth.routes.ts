// src/api/routes/auth.routes.ts
import { FastifyPluginAsync } from 'fastify';
import { AuthController } from '../controllers/auth.controller';
import { RateLimitQuotas } from '../policies/rate-limit.policy';
import { obtainTokenSchema, refreshTokenSchema, registerSchema } from '../validators/auth.fastify-schemas';

export interface AuthRoutesOptions {
    controller: AuthController;
    quota: RateLimitQuotas['anon'];
}

/**
 * Public endpoints, mounted under /api. All of them share the anonymous quota.
 */
const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (fastify, options) => {
    const { controller, quota } = options;

    fastify.post<{ Body: unknown }>('/token', {
        schema: obtainTokenSchema,
        preHandler: quota
    }, controller.obtainToken);

    fastify.post<{ Body: unknown }>('/token/refresh', {
        schema: refreshTokenSchema,
        preHandler: quota
    }, controller.refreshToken);

    fastify.post<{ Body: unknown }>('/auth/register', {
        schema: registerSchema,
        preHandler: quota
    }, controller.register);
};

export default authRoutes;
