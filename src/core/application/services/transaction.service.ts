// src/core/application/services/transaction.service.ts
import {
    isOwnedBy,
    parseTransactionId,
    Transaction
} from '../../domain/entities/transaction.entity';
import { UserRef } from '../../domain/entities/user.entity';
import { TransactionRepository } from '../../domain/repositories/transaction.repository';
import { TransactionFactory } from '../../domain/factories/transaction.factory';
import { NotFoundException } from '../../../shared/exceptions/not-found.exception';
import { todayIn } from '../../../shared/utils/date.util';
import { logger, LoggerService } from '../../../infrastructure/monitoring/logger.service';

export interface TransactionServiceOptions {
    /** IANA zone used to stamp the creation date. */
    timeZone: string;
    clock?: () => Date;
}

/**
 * Owner-scoped access to transactions. Every read and write is checked
 * against the caller with `isOwnedBy`; records that are missing and records
 * owned by someone else both surface as NotFoundException.
 */
export class TransactionService {
    private readonly log: LoggerService;
    private readonly clock: () => Date;

    constructor(
        private readonly transactions: TransactionRepository,
        private readonly options: TransactionServiceOptions
    ) {
        this.log = logger.child({ service: 'TransactionService' });
        this.clock = options.clock ?? (() => new Date());
    }

    async list(caller: UserRef): Promise<Transaction[]> {
        const owned = await this.transactions.findByOwner(caller.id);
        const visible = owned.filter(transaction => isOwnedBy(transaction, caller.id));

        this.log.debug('Listed transactions', { userId: caller.id, count: visible.length });
        return visible;
    }

    async get(caller: UserRef, id: string | number): Promise<Transaction> {
        return this.findOwned(caller, id);
    }

    async create(caller: UserRef, payload: unknown): Promise<Transaction> {
        const data = TransactionFactory.create(caller, payload, todayIn(this.options.timeZone, this.clock()));
        const transaction = await this.transactions.create(data);

        this.log.audit('create', `transaction:${transaction.id}`, caller.id, {
            transactionId: transaction.id,
            amount: transaction.amount,
            category: transaction.category
        });
        return transaction;
    }

    /**
     * Ownership is checked before the payload is validated, so a foreign id
     * answers NotFound even when the body is invalid.
     */
    async update(caller: UserRef, id: string | number, payload: unknown, partial: boolean): Promise<Transaction> {
        const existing = await this.findOwned(caller, id);
        const changes = TransactionFactory.changes(payload, partial);

        if (Object.keys(changes).length === 0) {
            return existing;
        }

        const updated = await this.transactions.update(existing.id, caller.id, changes);
        if (!updated || !isOwnedBy(updated, caller.id)) {
            throw new NotFoundException();
        }

        this.log.audit(partial ? 'partial_update' : 'update', `transaction:${updated.id}`, caller.id, {
            transactionId: updated.id,
            fields: Object.keys(changes)
        });
        return updated;
    }

    async delete(caller: UserRef, id: string | number): Promise<void> {
        const existing = await this.findOwned(caller, id);
        const deleted = await this.transactions.delete(existing.id, caller.id);
        if (!deleted) {
            throw new NotFoundException();
        }

        this.log.audit('delete', `transaction:${existing.id}`, caller.id, { transactionId: existing.id });
    }

    private async findOwned(caller: UserRef, rawId: string | number): Promise<Transaction> {
        const id = parseTransactionId(rawId);
        if (id === null) {
            throw new NotFoundException();
        }

        const transaction = await this.transactions.findById(id);
        if (!transaction || !isOwnedBy(transaction, caller.id)) {
            this.log.debug('Transaction not visible to caller', { userId: caller.id, transactionId: id });
            throw new NotFoundException();
        }
        return transaction;
    }
}
