// src/api/controllers/transaction.controller.ts
import { FastifyReply, FastifyRequest } from 'fastify';
import { TransactionService } from '../../core/application/services/transaction.service';
import { toRepresentation } from '../../core/domain/entities/transaction.entity';
import { requireCaller } from '../middlewares/jwt.middleware';

export interface TransactionParams {
    id: string;
}

/**
 * One handler per verb; each calls exactly one service operation with the
 * authenticated caller.
 */
export class TransactionController {
    constructor(private readonly transactionService: TransactionService) {}

    list = async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
        const transactions = await this.transactionService.list(requireCaller(request));
        reply.code(200).send(transactions.map(toRepresentation));
    };

    create = async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply): Promise<void> => {
        const transaction = await this.transactionService.create(requireCaller(request), request.body);
        reply.code(201).send(toRepresentation(transaction));
    };

    retrieve = async (
        request: FastifyRequest<{ Params: TransactionParams }>,
        reply: FastifyReply
    ): Promise<void> => {
        const transaction = await this.transactionService.get(requireCaller(request), request.params.id);
        reply.code(200).send(toRepresentation(transaction));
    };

    update = async (
        request: FastifyRequest<{ Params: TransactionParams; Body: unknown }>,
        reply: FastifyReply
    ): Promise<void> => {
        const transaction = await this.transactionService.update(
            requireCaller(request),
            request.params.id,
            request.body,
            false
        );
        reply.code(200).send(toRepresentation(transaction));
    };

    partialUpdate = async (
        request: FastifyRequest<{ Params: TransactionParams; Body: unknown }>,
        reply: FastifyReply
    ): Promise<void> => {
        const transaction = await this.transactionService.update(
            requireCaller(request),
            request.params.id,
            request.body,
            true
        );
        reply.code(200).send(toRepresentation(transaction));
    };

    destroy = async (
        request: FastifyRequest<{ Params: TransactionParams }>,
        reply: FastifyReply
    ): Promise<void> => {
        await this.transactionService.delete(requireCaller(request), request.params.id);
        reply.code(204).send();
    };
}
