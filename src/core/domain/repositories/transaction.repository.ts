// src/core/domain/repositories/transaction.repository.ts
import { NewTransaction, Transaction, TransactionChanges } from '../entities/transaction.entity';

export interface TransactionRepository {
    /** Transactions owned by `ownerId`, in insertion order. */
    findByOwner(ownerId: number): Promise<Transaction[]>;
    findById(id: number): Promise<Transaction | null>;
    create(data: NewTransaction): Promise<Transaction>;
    /** Returns null when no row with this id belongs to `ownerId`. */
    update(id: number, ownerId: number, changes: TransactionChanges): Promise<Transaction | null>;
    delete(id: number, ownerId: number): Promise<boolean>;
}
