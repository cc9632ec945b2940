// src/core/domain/entities/transaction.entity.ts

export const TRANSACTION_CATEGORIES = ['income', 'expense'] as const;

export type TransactionCategory = typeof TRANSACTION_CATEGORIES[number];

export interface Transaction {
    id: number;
    ownerId: number;
    /** Decimal string with two fraction digits, e.g. "100.50". */
    amount: string;
    category: TransactionCategory;
    description: string | null;
    /** Calendar date (YYYY-MM-DD) assigned on creation. */
    createdDate: string;
}

/** A validated transaction that has not been stored yet. */
export type NewTransaction = Omit<Transaction, 'id'>;

/** Fields a caller may change after creation. */
export type TransactionChanges = Partial<Pick<Transaction, 'amount' | 'category' | 'description'>>;

/** JSON shape returned by the API. */
export interface TransactionRepresentation {
    id: number;
    amount: string;
    category: TransactionCategory;
    description: string | null;
    date: string;
    owner: number;
}

export function isTransactionCategory(value: unknown): value is TransactionCategory {
    return typeof value === 'string' && (TRANSACTION_CATEGORIES as readonly string[]).includes(value);
}

export function isOwnedBy(transaction: Transaction, ownerId: number): boolean {
    return transaction.ownerId === ownerId;
}

export function toRepresentation(transaction: Transaction): TransactionRepresentation {
    return {
        id: transaction.id,
        amount: transaction.amount,
        category: transaction.category,
        description: transaction.description,
        date: transaction.createdDate,
        owner: transaction.ownerId
    };
}

/** Largest id the store can hold (PostgreSQL INTEGER). */
export const MAX_TRANSACTION_ID = 2147483647;

/**
 * Reads an id from a path segment. Anything that is not a positive integer
 * in range yields null, which callers report as not found.
 */
export function parseTransactionId(raw: string | number): number | null {
    const text = String(raw);
    if (!/^\d+$/.test(text)) {
        return null;
    }
    const id = Number(text);
    return id >= 1 && id <= MAX_TRANSACTION_ID ? id : null;
}
