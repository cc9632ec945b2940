// src/api/routes/health.routes.ts
import { FastifyPluginAsync } from 'fastify';

export interface HealthRoutesOptions {
    version: string;
    checkDatabase: () => Promise<boolean>;
}

const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, options) => {
    fastify.get('/health', {
        schema: {
            tags: ['Health'],
            summary: 'Health check',
            response: {
                200: {
                    type: 'object',
                    properties: {
                        status: { type: 'string' },
                        timestamp: { type: 'string' },
                        uptime: { type: 'number' },
                        version: { type: 'string' },
                        services: {
                            type: 'object',
                            properties: {
                                database: { type: 'string' }
                            }
                        }
                    }
                }
            }
        }
    }, async (request, reply) => {
        const databaseHealthy = await options.checkDatabase();

        return reply.code(databaseHealthy ? 200 : 503).send({
            status: databaseHealthy ? 'healthy' : 'unhealthy',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            version: options.version,
            services: {
                database: databaseHealthy ? 'healthy' : 'unhealthy'
            }
        });
    });
};

export default healthRoutes;
