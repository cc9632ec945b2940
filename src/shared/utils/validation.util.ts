// src/shared/utils/validation.util.ts
import { z } from 'zod';
import { FieldErrors, ValidationException } from '../exceptions/validation.exception';

export const NON_FIELD_ERRORS = 'non_field_errors';

export const ValidationMessages = {
    required: 'This field is required.',
    null: 'This field may not be null.',
    blank: 'This field may not be blank.',
    invalidString: 'Not a valid string.',
    invalidNumber: 'A valid number is required.',
    invalidPayload: 'Invalid data. Expected a JSON object.',
    noData: 'No data provided.'
} as const;

export class ValidationUtil {
    /**
     * Parses `data` with a Zod schema. Every issue is collected into a
     * field → messages map; issues without a path land in `non_field_errors`.
     */
    static validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
        const result = schema.safeParse(data);
        if (!result.success) {
            throw new ValidationException(ValidationUtil.toFieldErrors(result.error));
        }
        return result.data;
    }

    static toFieldErrors(error: z.ZodError): FieldErrors {
        const fieldErrors: FieldErrors = {};
        for (const issue of error.issues) {
            const field = issue.path.length > 0 ? String(issue.path[0]) : NON_FIELD_ERRORS;
            (fieldErrors[field] ??= []).push(issue.message);
        }
        return fieldErrors;
    }
}
