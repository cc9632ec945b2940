// src/api/validators/transaction.fastify-schemas.ts
// Response and params schemas for the transaction routes. Request bodies are
// validated by the Zod schemas in core/application/validators so every field
// error is reported in one response.

export const errorResponseSchema = {
    type: 'object',
    properties: {
        success: { type: 'boolean' },
        message: { type: 'string' },
        error: { type: 'string' },
        details: {
            type: 'object',
            additionalProperties: true,
            description: 'Field name → list of messages'
        }
    }
} as const;

export const transactionSchema = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        amount: { type: 'string', description: 'Decimal with two fraction digits' },
        category: { type: 'string', enum: ['income', 'expense'] },
        description: { type: ['string', 'null'] },
        date: { type: 'string', description: 'YYYY-MM-DD' },
        owner: { type: 'integer' }
    }
} as const;

export const transactionParamsSchema = {
    type: 'object',
    required: ['id'],
    properties: {
        id: { type: 'string', description: 'Transaction id' }
    }
} as const;

const security = [{ bearerAuth: [] }];

const errors = {
    401: { description: 'Missing or invalid access token', ...errorResponseSchema },
    429: { description: 'Quota exceeded', ...errorResponseSchema }
};

export const listTransactionsSchema = {
    tags: ['Transactions'],
    summary: 'List the caller\'s transactions',
    security,
    response: {
        200: { type: 'array', items: transactionSchema },
        ...errors
    }
};

export const createTransactionSchema = {
    tags: ['Transactions'],
    summary: 'Create a transaction owned by the caller',
    description: 'Body: `{ amount, category, description? }`. The date is set to today and the owner to the caller.',
    security,
    response: {
        201: transactionSchema,
        400: { description: 'Validation error', ...errorResponseSchema },
        ...errors
    }
};

export const getTransactionSchema = {
    tags: ['Transactions'],
    summary: 'Retrieve one of the caller\'s transactions',
    security,
    params: transactionParamsSchema,
    response: {
        200: transactionSchema,
        404: { description: 'Not found', ...errorResponseSchema },
        ...errors
    }
};

export const updateTransactionSchema = {
    tags: ['Transactions'],
    summary: 'Replace amount, category and description',
    description: 'Body: `{ amount, category, description? }`. An omitted description is kept.',
    security,
    params: transactionParamsSchema,
    response: {
        200: transactionSchema,
        400: { description: 'Validation error', ...errorResponseSchema },
        404: { description: 'Not found', ...errorResponseSchema },
        ...errors
    }
};

export const partialUpdateTransactionSchema = {
    ...updateTransactionSchema,
    summary: 'Update some fields of a transaction',
    description: 'Body: any of `{ amount, category, description }`.'
};

export const deleteTransactionSchema = {
    tags: ['Transactions'],
    summary: 'Delete one of the caller\'s transactions',
    security,
    params: transactionParamsSchema,
    response: {
        204: { type: 'null', description: 'Deleted' },
        404: { description: 'Not found', ...errorResponseSchema },
        ...errors
    }
};
