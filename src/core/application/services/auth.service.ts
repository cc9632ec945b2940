// src/core/application/services/auth.service.ts
import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { User, UserRef } from '../../domain/entities/user.entity';
import { UserRepository } from '../../domain/repositories/user.repository';
import { tokenObtainSchema, tokenRefreshSchema } from '../validators/auth.validator';
import { UnauthorizedException } from '../../../shared/exceptions/unauthorized.exception';
import { ValidationUtil } from '../../../shared/utils/validation.util';
import { logger } from '../../../infrastructure/monitoring/logger.service';

export type TokenType = 'access' | 'refresh';

export interface TokenPair {
    access: string;
    refresh: string;
}

export interface AuthServiceOptions {
    secret: string;
    /** Lifetimes in seconds. */
    accessTtl: number;
    refreshTtl: number;
    saltRounds?: number;
}

const INVALID_CREDENTIALS = 'No active account found with the given credentials';
const INVALID_TOKEN = 'Given token not valid for any token type';

export class AuthService {
    private readonly saltRounds: number;

    constructor(
        private readonly users: UserRepository,
        private readonly options: AuthServiceOptions
    ) {
        this.saltRounds = options.saltRounds ?? 12;
    }

    async hashPassword(password: string): Promise<string> {
        return bcrypt.hash(password, this.saltRounds);
    }

    async verifyPassword(password: string, hash: string): Promise<boolean> {
        return bcrypt.compare(password, hash);
    }

    /**
     * Exchanges username and password for an access/refresh token pair.
     */
    async obtainTokenPair(payload: unknown): Promise<TokenPair> {
        const { username, password } = ValidationUtil.validate(tokenObtainSchema, payload);

        const user = await this.users.findByUsername(username);
        if (!user || !user.isActive || !(await this.verifyPassword(password, user.passwordHash))) {
            logger.security('Failed token request', { username });
            throw new UnauthorizedException(INVALID_CREDENTIALS);
        }

        logger.info('Token pair issued', { userId: user.id });
        return {
            access: this.signToken(user, 'access'),
            refresh: this.signToken(user, 'refresh')
        };
    }

    async refreshAccessToken(payload: unknown): Promise<{ access: string }> {
        const { refresh } = ValidationUtil.validate(tokenRefreshSchema, payload);
        const user = await this.resolveUser(refresh, 'refresh');

        return { access: this.signToken(user, 'access') };
    }

    /**
     * Resolves the caller behind an access token. The user must still exist
     * and be active.
     */
    async authenticate(token: string): Promise<UserRef> {
        const user = await this.resolveUser(token, 'access');
        return { id: user.id, username: user.username };
    }

    signToken(user: Pick<User, 'id'>, type: TokenType): string {
        return jwt.sign({ type }, this.options.secret, {
            algorithm: 'HS256',
            subject: String(user.id),
            expiresIn: type === 'access' ? this.options.accessTtl : this.options.refreshTtl
        });
    }

    /**
     * Returns the user id carried by a token of the given type, or null when
     * the token is malformed, expired, wrongly signed or of the other type.
     */
    verifyToken(token: string, type: TokenType): number | null {
        let decoded: string | jwt.JwtPayload;
        try {
            decoded = jwt.verify(token, this.options.secret, { algorithms: ['HS256'] });
        } catch (error) {
            logger.debug('Token verification failed', {
                reason: error instanceof Error ? error.message : String(error)
            });
            return null;
        }

        if (typeof decoded === 'string' || decoded.type !== type || typeof decoded.sub !== 'string') {
            return null;
        }
        return /^\d+$/.test(decoded.sub) ? Number(decoded.sub) : null;
    }

    static extractTokenFromHeader(header: string | undefined): string | null {
        if (!header) {
            return null;
        }
        const [scheme, token, ...rest] = header.trim().split(/\s+/);
        if (scheme.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
            return null;
        }
        return token;
    }

    private async resolveUser(token: string, type: TokenType): Promise<User> {
        const userId = this.verifyToken(token, type);
        if (userId === null) {
            throw new UnauthorizedException(INVALID_TOKEN);
        }

        const user = await this.users.findById(userId);
        if (!user || !user.isActive) {
            logger.security('Token presented for missing or inactive user', { userId });
            throw new UnauthorizedException('User not found');
        }
        return user;
    }
}
