// src/api/routes/transaction.routes.ts
import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { TransactionController, TransactionParams } from '../controllers/transaction.controller';
import { RateLimitQuotas } from '../policies/rate-limit.policy';
import {
    createTransactionSchema,
    deleteTransactionSchema,
    getTransactionSchema,
    listTransactionsSchema,
    partialUpdateTransactionSchema,
    updateTransactionSchema
} from '../validators/transaction.fastify-schemas';

export interface TransactionRoutesOptions {
    controller: TransactionController;
    authenticate: (request: FastifyRequest) => Promise<void>;
    quota: RateLimitQuotas['user'];
}

/**
 * Mounted under /api/transactions. Authentication runs on onRequest so a
 * missing token answers 401 before the quota, the body or the id are looked at.
 */
const transactionRoutes: FastifyPluginAsync<TransactionRoutesOptions> = async (fastify, options) => {
    const { controller, authenticate, quota } = options;

    fastify.addHook('onRequest', authenticate);

    fastify.route({
        method: 'GET',
        url: '/',
        prefixTrailingSlash: 'no-slash',
        schema: listTransactionsSchema,
        preHandler: quota,
        handler: controller.list
    });

    fastify.route<{ Body: unknown }>({
        method: 'POST',
        url: '/',
        prefixTrailingSlash: 'no-slash',
        schema: createTransactionSchema,
        preHandler: quota,
        handler: controller.create
    });

    fastify.route<{ Params: TransactionParams }>({
        method: 'GET',
        url: '/:id',
        schema: getTransactionSchema,
        preHandler: quota,
        handler: controller.retrieve
    });

    fastify.route<{ Params: TransactionParams; Body: unknown }>({
        method: 'PUT',
        url: '/:id',
        schema: updateTransactionSchema,
        preHandler: quota,
        handler: controller.update
    });

    fastify.route<{ Params: TransactionParams; Body: unknown }>({
        method: 'PATCH',
        url: '/:id',
        schema: partialUpdateTransactionSchema,
        preHandler: quota,
        handler: controller.partialUpdate
    });

    fastify.route<{ Params: TransactionParams }>({
        method: 'DELETE',
        url: '/:id',
        schema: deleteTransactionSchema,
        preHandler: quota,
        handler: controller.destroy
    });
};

export default transactionRoutes;
