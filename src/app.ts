// src/app.ts
import fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { Environment } from './config/environment';
import { logger } from './infrastructure/monitoring/logger.service';
import { TransactionRepository } from './core/domain/repositories/transaction.repository';
import { UserRepository } from './core/domain/repositories/user.repository';
import { TransactionService } from './core/application/services/transaction.service';
import { AuthService } from './core/application/services/auth.service';
import { UserService } from './core/application/services/user.service';
import { TransactionController } from './api/controllers/transaction.controller';
import { AuthController } from './api/controllers/auth.controller';
import { JWTMiddleware } from './api/middlewares/jwt.middleware';
import { SecurityMiddleware } from './api/middlewares/security.middleware';
import { createRateLimitQuotas } from './api/policies/rate-limit.policy';
import transactionRoutes from './api/routes/transaction.routes';
import authRoutes from './api/routes/auth.routes';
import healthRoutes from './api/routes/health.routes';
import docsRoutes from './api/routes/docs.routes';
import { BaseException } from './shared/exceptions/base.exception';
import { ValidationException } from './shared/exceptions/validation.exception';

export const API_VERSION = '1.0.0';
const API_TITLE = 'Ledger API';

export interface AppDependencies {
    config: Environment;
    transactionRepository: TransactionRepository;
    userRepository: UserRepository;
    /** Reported by /api/health. */
    checkDatabase?: () => Promise<boolean>;
    /** bcrypt cost; lowered in tests. */
    saltRounds?: number;
}

export class App {
    private readonly fastify: FastifyInstance;
    private readonly config: Environment;
    private readonly transactionService: TransactionService;
    private readonly authService: AuthService;
    private readonly userService: UserService;

    constructor(private readonly dependencies: AppDependencies) {
        this.config = dependencies.config;

        this.transactionService = new TransactionService(dependencies.transactionRepository, {
            timeZone: this.config.TIME_ZONE
        });
        this.authService = new AuthService(dependencies.userRepository, {
            secret: this.config.JWT_SECRET,
            accessTtl: this.config.JWT_ACCESS_TTL,
            refreshTtl: this.config.JWT_REFRESH_TTL,
            saltRounds: dependencies.saltRounds
        });
        this.userService = new UserService(dependencies.userRepository, this.authService);

        this.fastify = fastify({
            logger: false, // LoggerService handles request logging
            trustProxy: this.config.TRUST_PROXY,
            ignoreTrailingSlash: true,
            bodyLimit: 1048576
        });
    }

    public async initialize(): Promise<void> {
        try {
            logger.info('Initializing application...', {
                environment: this.config.NODE_ENV,
                swagger: this.config.ENABLE_SWAGGER
            });

            await this.setupPlugins();
            this.setupHooks();
            // Route plugins take the error handler in place when they register
            this.setupErrorHandlers();
            await this.setupRoutes();

            await this.fastify.ready();
            logger.info('Application initialized successfully');
        } catch (error) {
            logger.fatal('Failed to initialize application', error);
            throw error;
        }
    }

    private async setupPlugins(): Promise<void> {
        await this.fastify.register(cors, {
            origin: this.config.CORS_ORIGIN.split(',').map(origin => origin.trim()),
            credentials: true
        });

        const isProduction = this.config.NODE_ENV === 'production';
        await this.fastify.register(helmet, {
            // Swagger UI ships inline scripts
            contentSecurityPolicy: false,
            hsts: this.config.SECURE_HSTS_SECONDS > 0
                ? {
                    maxAge: this.config.SECURE_HSTS_SECONDS,
                    includeSubDomains: isProduction,
                    preload: isProduction
                }
                : false
        });

        // Quotas are attached per route, see createRateLimitQuotas
        await this.fastify.register(rateLimit, {
            global: false,
            addHeaders: {
                'x-ratelimit-limit': true,
                'x-ratelimit-remaining': true,
                'x-ratelimit-reset': true,
                'retry-after': true
            }
        });

        if (this.config.ENABLE_SWAGGER) {
            await this.fastify.register(swagger, {
                openapi: {
                    info: {
                        title: API_TITLE,
                        description: 'Personal finance transactions API',
                        version: API_VERSION
                    },
                    tags: [
                        { name: 'Auth', description: 'Token issue and registration' },
                        { name: 'Transactions', description: 'Owner-scoped transaction records' },
                        { name: 'Health', description: 'Health check endpoints' }
                    ],
                    components: {
                        securitySchemes: {
                            bearerAuth: {
                                type: 'http',
                                scheme: 'bearer',
                                bearerFormat: 'JWT'
                            }
                        }
                    }
                }
            });

            await this.fastify.register(swaggerUi, {
                routePrefix: '/docs',
                uiConfig: {
                    docExpansion: 'list',
                    deepLinking: false
                }
            });
        }

        logger.debug('Fastify plugins registered');
    }

    private setupHooks(): void {
        const security = new SecurityMiddleware({
            allowedHosts: this.config.ALLOWED_HOSTS,
            sslRedirect: this.config.SECURE_SSL_REDIRECT
        });
        this.fastify.addHook('onRequest', security.guard);

        this.fastify.addHook('onResponse', async (request, reply) => {
            const duration = Math.round(reply.elapsedTime);

            logger.http(`${request.method} ${request.url} - ${reply.statusCode} - ${duration}ms`, {
                requestId: request.id,
                method: request.method,
                url: request.url,
                statusCode: reply.statusCode,
                duration,
                ip: request.ip,
                userId: request.user?.id
            });
        });
    }

    private async setupRoutes(): Promise<void> {
        const quotas = createRateLimitQuotas(this.fastify, {
            user: this.config.THROTTLE_USER_RATE,
            anon: this.config.THROTTLE_ANON_RATE
        });
        const jwtMiddleware = new JWTMiddleware(this.authService);

        await this.fastify.register(transactionRoutes, {
            prefix: '/api/transactions',
            controller: new TransactionController(this.transactionService),
            authenticate: jwtMiddleware.authenticate,
            quota: quotas.user
        });

        await this.fastify.register(authRoutes, {
            prefix: '/api',
            controller: new AuthController(this.authService, this.userService),
            quota: quotas.anon
        });

        await this.fastify.register(healthRoutes, {
            prefix: '/api',
            version: API_VERSION,
            checkDatabase: this.dependencies.checkDatabase ?? (async () => true)
        });

        if (this.config.ENABLE_SWAGGER) {
            await this.fastify.register(docsRoutes, { title: API_TITLE, specUrl: '/docs/json' });
        }

        logger.debug('Routes registered');
    }

    private setupErrorHandlers(): void {
        this.fastify.setErrorHandler(async (error: FastifyError, request, reply) => {
            const context = {
                requestId: request.id,
                method: request.method,
                url: request.url,
                userId: request.user?.id
            };

            if (error instanceof ValidationException) {
                logger.warn('Validation failed', { ...context, fields: Object.keys(error.fieldErrors) });
                return reply.code(400).send(error.toJSON());
            }

            if (error instanceof BaseException) {
                if (error.statusCode === 401) {
                    reply.header('WWW-Authenticate', 'Bearer realm="api"');
                }
                logger.warn(error.message, { ...context, code: error.code, statusCode: error.statusCode });
                return reply.code(error.statusCode).send(error.toJSON());
            }

            // Fastify schema validation (route params)
            if (error.validation) {
                logger.warn('Request schema validation failed', context);
                return reply.code(400).send({
                    success: false,
                    message: 'Validation error',
                    error: 'VALIDATION_ERROR',
                    details: error.validation
                });
            }

            if (error.statusCode === 429) {
                return reply.code(429).send({
                    success: false,
                    message: error.message || 'Rate limit exceeded',
                    error: 'RATE_LIMIT_EXCEEDED'
                });
            }

            // Malformed or empty JSON, unsupported media type, oversized body
            if (error.statusCode && error.statusCode < 500) {
                logger.warn(error.message, { ...context, code: error.code });
                return reply.code(error.statusCode).send({
                    success: false,
                    message: error.message || 'Client error',
                    error: 'CLIENT_ERROR'
                });
            }

            logger.error('Request error', error, context);
            return reply.code(500).send({
                success: false,
                message: this.config.NODE_ENV === 'development' ? error.message : 'Internal server error',
                error: 'SERVER_ERROR'
            });
        });

        this.fastify.setNotFoundHandler(async (request, reply) => {
            logger.warn('Route not found', {
                method: request.method,
                url: request.url,
                ip: request.ip
            });

            return reply.code(404).send({
                success: false,
                message: 'Route not found',
                error: 'ROUTE_NOT_FOUND'
            });
        });
    }

    public async start(): Promise<void> {
        await this.fastify.listen({
            host: this.config.HOST,
            port: this.config.PORT
        });

        logger.info(`🚀 Server is running on http://${this.config.HOST}:${this.config.PORT}`, {
            environment: this.config.NODE_ENV,
            pid: process.pid
        });

        if (this.config.ENABLE_SWAGGER) {
            logger.info(`📚 API documentation available at http://localhost:${this.config.PORT}/docs and /redoc`);
        }
    }

    public async close(): Promise<void> {
        await this.fastify.close();
        logger.info('Server closed successfully');
    }

    public getFastifyInstance(): FastifyInstance {
        return this.fastify;
    }

    public getPort(): number {
        return this.config.PORT;
    }
}

export default App;
