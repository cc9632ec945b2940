// src/server.ts
import dotenv from 'dotenv';

dotenv.config();

import { Pool } from 'pg';
import App from './app';
import { ConfigService, ConfigurationError } from './config/environment';
import { logger } from './infrastructure/monitoring/logger.service';
import { checkPostgresHealth, closePostgreSQL, connectPostgreSQL } from './infrastructure/database/connections';
import { runMigrations } from './infrastructure/database/postgres/migrator';
import { TransactionRepositoryImpl } from './infrastructure/database/postgres/repositories/transaction.repository.impl';
import { UserRepositoryImpl } from './infrastructure/database/postgres/repositories/user.repository.impl';

const SHUTDOWN_TIMEOUT_MS = 30000;

/**
 * Process entry point: validates configuration, connects PostgreSQL, applies
 * migrations, starts the HTTP app and shuts everything down on signals.
 */
export class Server {
    private readonly config: ConfigService;
    private pool?: Pool;
    private app?: App;
    private shutdownInProgress = false;

    constructor(config: ConfigService) {
        this.config = config;
        this.setupShutdownHandlers();
    }

    async start(): Promise<void> {
        logger.info('🔄 Initializing server...', {
            nodeVersion: process.version,
            environment: this.config.get('NODE_ENV')
        });

        const pool = await connectPostgreSQL(this.config);
        this.pool = pool;
        await runMigrations(pool);

        this.app = new App({
            config: this.config.getAll(),
            transactionRepository: new TransactionRepositoryImpl(pool),
            userRepository: new UserRepositoryImpl(pool),
            checkDatabase: () => checkPostgresHealth(pool)
        });

        await this.app.initialize();
        await this.app.start();

        logger.info('🎉 Server initialization completed', {
            port: this.app.getPort(),
            processId: process.pid
        });
    }

    private setupShutdownHandlers(): void {
        process.on('SIGTERM', () => this.handleShutdownSignal('SIGTERM'));
        process.on('SIGINT', () => this.handleShutdownSignal('SIGINT'));

        process.on('unhandledRejection', (reason: unknown) => {
            logger.error('Unhandled Rejection - shutting down', reason);
            void this.gracefulShutdown().finally(() => process.exit(1));
        });
    }

    private handleShutdownSignal(signal: string): void {
        logger.info(`${signal} received - initiating graceful shutdown`);
        void this.gracefulShutdown().then(() => process.exit(0));
    }

    async gracefulShutdown(): Promise<void> {
        if (this.shutdownInProgress) {
            logger.warn('Shutdown already in progress, ignoring...');
            return;
        }
        this.shutdownInProgress = true;

        const shutdownTimeout = setTimeout(() => {
            logger.error('⏰ Shutdown timeout exceeded, forcing exit');
            process.exit(1);
        }, SHUTDOWN_TIMEOUT_MS);
        shutdownTimeout.unref();

        try {
            if (this.app) {
                await this.app.close();
            }
        } catch (error) {
            logger.warn('⚠️  Error stopping HTTP server', { error });
        }

        try {
            if (this.pool) {
                await closePostgreSQL(this.pool);
            }
        } catch (error) {
            logger.warn('⚠️  Error closing database connections', { error });
        }

        clearTimeout(shutdownTimeout);
        await logger.flush();
    }
}

async function main(): Promise<void> {
    let config: ConfigService;
    try {
        config = ConfigService.getInstance();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            logger.fatal('Invalid configuration', undefined, { problems: error.problems });
            process.exit(1);
        }
        throw error;
    }

    const level = config.get('LOG_LEVEL');
    if (level) {
        logger.setLevel(level);
    }

    const server = new Server(config);
    try {
        await server.start();
    } catch (error) {
        logger.fatal('❌ Failed to start server', error);
        await server.gracefulShutdown();
        process.exit(1);
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.fatal('Failed to start application', error);
        process.exit(1);
    });
}
