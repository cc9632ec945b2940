// src/core/domain/entities/user.entity.ts

export interface User {
    id: number;
    username: string;
    passwordHash: string;
    isActive: boolean;
    createdAt: Date;
}

export type NewUser = Pick<User, 'username' | 'passwordHash'>;

/** The authenticated caller every transaction operation is scoped to. */
export interface UserRef {
    id: number;
    username?: string;
}
