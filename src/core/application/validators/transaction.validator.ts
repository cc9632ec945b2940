// src/core/application/validators/transaction.validator.ts
import { z } from 'zod';
import { InvalidMoneyError, Money } from '../../domain/value-objects/money.vo';
import { isTransactionCategory, TransactionCategory } from '../../domain/entities/transaction.entity';
import { ValidationMessages } from '../../../shared/utils/validation.util';

const present = (value: unknown, ctx: z.RefinementCtx): boolean => {
    if (value === undefined || value === null) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: value === undefined ? ValidationMessages.required : ValidationMessages.null
        });
        return false;
    }
    return true;
};

/**
 * Decimal amount given as a string or a number, normalised to two fraction digits.
 */
const amountField = z.unknown().transform((value, ctx): string => {
    if (!present(value, ctx)) {
        return z.NEVER;
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: ValidationMessages.invalidNumber });
        return z.NEVER;
    }
    try {
        return Money.parse(value).toString();
    } catch (error) {
        if (error instanceof InvalidMoneyError) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
            return z.NEVER;
        }
        throw error;
    }
});

const categoryField = z.unknown().transform((value, ctx): TransactionCategory => {
    if (!present(value, ctx)) {
        return z.NEVER;
    }
    if (!isTransactionCategory(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${String(value)}" is not a valid choice.` });
        return z.NEVER;
    }
    return value;
});

// Trimmed; an empty result is stored as null.
const descriptionField = z.unknown().transform((value, ctx): string | null => {
    if (value === undefined || value === null) {
        return null;
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: ValidationMessages.invalidString });
        return z.NEVER;
    }
    const text = String(value).trim();
    return text.length > 0 ? text : null;
});

const payloadErrors = {
    invalid_type_error: ValidationMessages.invalidPayload,
    required_error: ValidationMessages.noData
};

// Keys outside the shape (id, owner, user, date, created_date) are stripped.
export const createTransactionSchema = z.object({
    amount: amountField,
    category: categoryField,
    description: descriptionField
}, payloadErrors);

export const updateTransactionSchema = z.object({
    amount: amountField,
    category: categoryField,
    description: descriptionField.optional()
}, payloadErrors);

export const partialUpdateTransactionSchema = z.object({
    amount: amountField.optional(),
    category: categoryField.optional(),
    description: descriptionField.optional()
}, payloadErrors);
