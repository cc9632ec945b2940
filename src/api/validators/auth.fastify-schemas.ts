// src/api/validators/auth.fastify-schemas.ts
import { errorResponseSchema } from './transaction.fastify-schemas';

const throttled = { 429: { description: 'Quota exceeded', ...errorResponseSchema } };

export const obtainTokenSchema = {
    tags: ['Auth'],
    summary: 'Obtain an access/refresh token pair',
    description: 'Body: `{ username, password }`.',
    response: {
        200: {
            type: 'object',
            properties: {
                access: { type: 'string' },
                refresh: { type: 'string' }
            }
        },
        400: { description: 'Validation error', ...errorResponseSchema },
        401: { description: 'Invalid credentials', ...errorResponseSchema },
        ...throttled
    }
};

export const refreshTokenSchema = {
    tags: ['Auth'],
    summary: 'Exchange a refresh token for a new access token',
    description: 'Body: `{ refresh }`.',
    response: {
        200: {
            type: 'object',
            properties: {
                access: { type: 'string' }
            }
        },
        400: { description: 'Validation error', ...errorResponseSchema },
        401: { description: 'Invalid or expired token', ...errorResponseSchema },
        ...throttled
    }
};

export const registerSchema = {
    tags: ['Auth'],
    summary: 'Create a user account',
    description: 'Body: `{ username, password }`.',
    response: {
        201: {
            type: 'object',
            properties: {
                id: { type: 'integer' },
                username: { type: 'string' }
            }
        },
        400: { description: 'Validation error', ...errorResponseSchema },
        409: { description: 'Username taken', ...errorResponseSchema },
        ...throttled
    }
};
