// src/api/controllers/auth.controller.ts
import { FastifyReply, FastifyRequest } from 'fastify';
import { AuthService } from '../../core/application/services/auth.service';
import { UserService } from '../../core/application/services/user.service';

export class AuthController {
    constructor(
        private readonly authService: AuthService,
        private readonly userService: UserService
    ) {}

    /**
     * POST /api/token
     */
    obtainToken = async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply): Promise<void> => {
        const tokens = await this.authService.obtainTokenPair(request.body);
        reply.code(200).send(tokens);
    };

    /**
     * POST /api/token/refresh
     */
    refreshToken = async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply): Promise<void> => {
        const result = await this.authService.refreshAccessToken(request.body);
        reply.code(200).send(result);
    };

    /**
     * POST /api/auth/register
     */
    register = async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply): Promise<void> => {
        const user = await this.userService.register(request.body);
        reply.code(201).send(user);
    };
}
