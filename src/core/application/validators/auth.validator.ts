// src/core/application/validators/auth.validator.ts
import { z } from 'zod';
import { ValidationMessages } from '../../../shared/utils/validation.util';

export const USERNAME_MAX_LENGTH = 150;
export const PASSWORD_MIN_LENGTH = 8;

const text = () => z.string({
    required_error: ValidationMessages.required,
    invalid_type_error: ValidationMessages.invalidString
});

const payloadErrors = {
    invalid_type_error: ValidationMessages.invalidPayload,
    required_error: ValidationMessages.noData
};

export const tokenObtainSchema = z.object({
    username: text().min(1, ValidationMessages.blank),
    password: text().min(1, ValidationMessages.blank)
}, payloadErrors);

export const tokenRefreshSchema = z.object({
    refresh: text().min(1, ValidationMessages.blank)
}, payloadErrors);

export const registerUserSchema = z.object({
    username: text()
        .trim()
        .min(1, ValidationMessages.blank)
        .max(USERNAME_MAX_LENGTH, `Ensure this field has no more than ${USERNAME_MAX_LENGTH} characters.`)
        .regex(
            /^[\w.@+-]+$/,
            'Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.'
        ),
    password: text()
        .min(1, ValidationMessages.blank)
        .min(PASSWORD_MIN_LENGTH, `This password is too short. It must contain at least ${PASSWORD_MIN_LENGTH} characters.`)
        .refine(value => !/^\d+$/.test(value), 'This password is entirely numeric.')
}, payloadErrors);
