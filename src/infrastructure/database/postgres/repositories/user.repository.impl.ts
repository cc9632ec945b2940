// src/infrastructure/database/postgres/repositories/user.repository.impl.ts
import { Pool } from 'pg';
import { UserRepository } from '../../../../core/domain/repositories/user.repository';
import { NewUser, User } from '../../../../core/domain/entities/user.entity';
import { ConflictException } from '../../../../shared/exceptions/conflict.exception';
import { logger } from '../../../monitoring/logger.service';

export interface UserRow {
    id: number;
    username: string;
    password_hash: string;
    is_active: boolean;
    created_at: Date;
}

const COLUMNS = 'id, username, password_hash, is_active, created_at';
const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

export class UserRepositoryImpl implements UserRepository {
    constructor(private readonly pool: Pick<Pool, 'query'>) {}

    async findById(id: number): Promise<User | null> {
        const result = await this.pool.query<UserRow>(`SELECT ${COLUMNS} FROM users WHERE id = $1`, [id]);
        const row = result.rows[0];
        return row ? this.toDomain(row) : null;
    }

    async findByUsername(username: string): Promise<User | null> {
        const result = await this.pool.query<UserRow>(`SELECT ${COLUMNS} FROM users WHERE username = $1`, [username]);
        const row = result.rows[0];
        return row ? this.toDomain(row) : null;
    }

    async create(data: NewUser): Promise<User> {
        try {
            const result = await this.pool.query<UserRow>(
                `INSERT INTO users (username, password_hash) VALUES ($1, $2) RETURNING ${COLUMNS}`,
                [data.username, data.passwordHash]
            );
            const row = result.rows[0];
            if (!row) {
                throw new Error('Insert into users returned no row');
            }
            logger.database('User inserted', { userId: row.id });
            return this.toDomain(row);
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new ConflictException('A user with that username already exists.');
            }
            throw error;
        }
    }

    /**
     * Owned transactions go with the user through ON DELETE CASCADE.
     */
    async delete(id: number): Promise<boolean> {
        const result = await this.pool.query('DELETE FROM users WHERE id = $1', [id]);
        return (result.rowCount ?? 0) > 0;
    }

    private toDomain(row: UserRow): User {
        return {
            id: row.id,
            username: row.username,
            passwordHash: row.password_hash,
            isActive: row.is_active,
            createdAt: row.created_at
        };
    }
}
