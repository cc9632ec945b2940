// src/infrastructure/database/connections.ts
import { Pool, PoolConfig, types } from 'pg';
import { ConfigService } from '../../config/environment';
import { logger } from '../monitoring/logger.service';

// DATE columns stay 'YYYY-MM-DD' strings instead of local-midnight Date objects
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

export function getPostgresConfig(config: ConfigService): PoolConfig {
    return {
        connectionString: config.getDatabaseUrl(),
        max: config.get('POSTGRES_MAX_CONNECTIONS'),
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 10000,
        application_name: 'ledger-api'
    };
}

/**
 * Opens the pool and checks it with a round trip.
 */
export async function connectPostgreSQL(config: ConfigService): Promise<Pool> {
    const pool = new Pool(getPostgresConfig(config));

    pool.on('error', (error) => {
        logger.error('PostgreSQL pool error', error);
    });

    try {
        const result = await pool.query<{ version: string }>('SELECT version() AS version');
        logger.info('✅ PostgreSQL connected', {
            database: config.get('POSTGRES_DB'),
            version: result.rows[0]?.version.split(' ')[1]
        });
        return pool;
    } catch (error) {
        logger.error('❌ Failed to connect to PostgreSQL', error);
        await pool.end();
        throw error;
    }
}

export async function checkPostgresHealth(pool: Pick<Pool, 'query'>): Promise<boolean> {
    try {
        await pool.query('SELECT 1');
        return true;
    } catch (error) {
        logger.warn('PostgreSQL health check failed', {
            error: error instanceof Error ? error.message : String(error)
        });
        return false;
    }
}

export async function closePostgreSQL(pool: Pool): Promise<void> {
    await pool.end();
    logger.info('PostgreSQL pool closed');
}
