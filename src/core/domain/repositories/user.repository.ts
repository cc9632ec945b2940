// src/core/domain/repositories/user.repository.ts
import { NewUser, User } from '../entities/user.entity';

export interface UserRepository {
    findById(id: number): Promise<User | null>;
    findByUsername(username: string): Promise<User | null>;
    create(data: NewUser): Promise<User>;
    /** Removing a user removes every transaction it owns. */
    delete(id: number): Promise<boolean>;
}
