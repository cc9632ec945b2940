// src/core/domain/factories/transaction.factory.ts
import { NewTransaction, Transaction, TransactionChanges } from '../entities/transaction.entity';
import { UserRef } from '../entities/user.entity';
import {
    createTransactionSchema,
    partialUpdateTransactionSchema,
    updateTransactionSchema
} from '../../application/validators/transaction.validator';
import { ValidationUtil } from '../../../shared/utils/validation.util';

export class TransactionFactory {
    /**
     * Builds a new transaction from an untrusted payload. The owner always
     * comes from `owner`; any owner, id or date in the payload is dropped.
     */
    static create(owner: UserRef, payload: unknown, createdDate: string): NewTransaction {
        const input = ValidationUtil.validate(createTransactionSchema, payload);

        return {
            ownerId: owner.id,
            amount: input.amount,
            category: input.category,
            description: input.description,
            createdDate
        };
    }

    /**
     * Validates an update payload. A full update requires amount and
     * category; a partial one checks only the fields it carries. An omitted
     * description is left out of the changes.
     */
    static changes(payload: unknown, partial: boolean): TransactionChanges {
        const input = partial
            ? ValidationUtil.validate(partialUpdateTransactionSchema, payload)
            : ValidationUtil.validate(updateTransactionSchema, payload);

        const changes: TransactionChanges = {};
        if (input.amount !== undefined) changes.amount = input.amount;
        if (input.category !== undefined) changes.category = input.category;
        if (input.description !== undefined) changes.description = input.description;
        return changes;
    }

    static apply(transaction: Transaction, changes: TransactionChanges): Transaction {
        return { ...transaction, ...changes };
    }
}
