// src/core/application/services/user.service.ts
import { UserRepository } from '../../domain/repositories/user.repository';
import { registerUserSchema } from '../validators/auth.validator';
import { AuthService } from './auth.service';
import { ConflictException } from '../../../shared/exceptions/conflict.exception';
import { NotFoundException } from '../../../shared/exceptions/not-found.exception';
import { ValidationUtil } from '../../../shared/utils/validation.util';
import { logger } from '../../../infrastructure/monitoring/logger.service';

export interface RegisteredUser {
    id: number;
    username: string;
}

export class UserService {
    constructor(
        private readonly users: UserRepository,
        private readonly auth: AuthService
    ) {}

    async register(payload: unknown): Promise<RegisteredUser> {
        const { username, password } = ValidationUtil.validate(registerUserSchema, payload);

        if (await this.users.findByUsername(username)) {
            throw new ConflictException('A user with that username already exists.');
        }

        const user = await this.users.create({
            username,
            passwordHash: await this.auth.hashPassword(password)
        });

        logger.audit('register', `user:${user.id}`, user.id);
        return { id: user.id, username: user.username };
    }

    /**
     * Removes a user together with every transaction it owns.
     */
    async deleteUser(id: number): Promise<void> {
        const deleted = await this.users.delete(id);
        if (!deleted) {
            throw new NotFoundException();
        }
        logger.audit('delete', `user:${id}`, id);
    }
}
