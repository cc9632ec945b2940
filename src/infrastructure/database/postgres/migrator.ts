// src/infrastructure/database/postgres/migrator.ts
import { promises as fs } from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { logger } from '../../monitoring/logger.service';

export const MIGRATIONS_DIR = path.resolve(__dirname, '../../../../database/migrations');

/**
 * Applies every *.sql file in `directory` that is not yet recorded in
 * schema_migrations, in file name order, each inside its own transaction.
 */
export async function runMigrations(pool: Pick<Pool, 'query' | 'connect'>, directory: string = MIGRATIONS_DIR): Promise<string[]> {
    await pool.query(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
            name VARCHAR(255) PRIMARY KEY,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
    `);

    const files = (await fs.readdir(directory)).filter(file => file.endsWith('.sql')).sort();
    const applied = await pool.query<{ name: string }>('SELECT name FROM schema_migrations');
    const done = new Set(applied.rows.map(row => row.name));
    const pending = files.filter(file => !done.has(file));

    for (const file of pending) {
        const sql = await fs.readFile(path.join(directory, file), 'utf8');
        const client = await pool.connect();
        try {
            await client.query('BEGIN');
            await client.query(sql);
            await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
            await client.query('COMMIT');
            logger.database(`Applied migration ${file}`);
        } catch (error) {
            await client.query('ROLLBACK');
            logger.error(`Migration ${file} failed`, error);
            throw error;
        } finally {
            client.release();
        }
    }

    if (pending.length === 0) {
        logger.database('Database schema is up to date');
    }
    return pending;
}
