// src/infrastructure/database/postgres/repositories/transaction.repository.impl.ts
import { Pool } from 'pg';
import { TransactionRepository } from '../../../../core/domain/repositories/transaction.repository';
import {
    isTransactionCategory,
    NewTransaction,
    Transaction,
    TransactionChanges
} from '../../../../core/domain/entities/transaction.entity';
import { logger } from '../../../monitoring/logger.service';

export interface TransactionRow {
    id: number;
    user_id: number;
    amount: string;
    category: string;
    description: string | null;
    created_date: string;
}

const COLUMNS = 'id, user_id, amount, category, description, created_date';

// Column names match the entity keys
const CHANGE_KEYS = ['amount', 'category', 'description'] as const satisfies ReadonlyArray<keyof TransactionChanges>;

export class TransactionRepositoryImpl implements TransactionRepository {
    constructor(private readonly pool: Pick<Pool, 'query'>) {}

    async findByOwner(ownerId: number): Promise<Transaction[]> {
        const result = await this.pool.query<TransactionRow>(
            `SELECT ${COLUMNS} FROM transactions WHERE user_id = $1 ORDER BY id ASC`,
            [ownerId]
        );
        return result.rows.map(row => this.mapRowToTransaction(row));
    }

    async findById(id: number): Promise<Transaction | null> {
        const result = await this.pool.query<TransactionRow>(
            `SELECT ${COLUMNS} FROM transactions WHERE id = $1`,
            [id]
        );
        const row = result.rows[0];
        return row ? this.mapRowToTransaction(row) : null;
    }

    async create(data: NewTransaction): Promise<Transaction> {
        const result = await this.pool.query<TransactionRow>(
            `INSERT INTO transactions (user_id, amount, category, description, created_date)
             VALUES ($1, $2, $3, $4, $5)
             RETURNING ${COLUMNS}`,
            [data.ownerId, data.amount, data.category, data.description, data.createdDate]
        );

        const row = result.rows[0];
        if (!row) {
            throw new Error('Insert into transactions returned no row');
        }
        logger.database('Transaction inserted', { transactionId: row.id, userId: data.ownerId });
        return this.mapRowToTransaction(row);
    }

    async update(id: number, ownerId: number, changes: TransactionChanges): Promise<Transaction | null> {
        const assignments: string[] = [];
        const values: unknown[] = [];

        for (const key of CHANGE_KEYS) {
            if (changes[key] !== undefined) {
                values.push(changes[key]);
                assignments.push(`${key} = $${values.length}`);
            }
        }

        if (assignments.length === 0) {
            const current = await this.findById(id);
            return current && current.ownerId === ownerId ? current : null;
        }

        values.push(id, ownerId);
        const result = await this.pool.query<TransactionRow>(
            `UPDATE transactions SET ${assignments.join(', ')}
             WHERE id = $${values.length - 1} AND user_id = $${values.length}
             RETURNING ${COLUMNS}`,
            values
        );

        const row = result.rows[0];
        return row ? this.mapRowToTransaction(row) : null;
    }

    async delete(id: number, ownerId: number): Promise<boolean> {
        const result = await this.pool.query(
            'DELETE FROM transactions WHERE id = $1 AND user_id = $2',
            [id, ownerId]
        );
        return (result.rowCount ?? 0) > 0;
    }

    private mapRowToTransaction(row: TransactionRow): Transaction {
        if (!isTransactionCategory(row.category)) {
            throw new Error(`Unexpected transaction category "${row.category}" in row ${row.id}`);
        }
        return {
            id: row.id,
            ownerId: row.user_id,
            amount: row.amount,
            category: row.category,
            description: row.description,
            createdDate: row.created_date
        };
    }
}
