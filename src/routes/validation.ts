import { z, type ZodError } from 'zod';
import { ApiError } from '../errors/api-error.js';
import {
  EMAIL_MAX_LENGTH,
  PASSWORD_MIN_LENGTH,
  PASSWORD_MAX_LENGTH,
  USERNAME_MIN_LENGTH,
  USERNAME_MAX_LENGTH,
} from '../config/constants.js';

function isValidEmail(email: string): boolean {
  const parts = email.split('@');
  if (parts.length !== 2) {
    return false;
  }
  const [local, domain] = parts;
  if (!local || !domain || /\s/.test(email)) {
    return false;
  }
  return domain.includes('.') && !domain.startsWith('.') && !domain.endsWith('.');
}

export const emailSchema = z
  .string({ required_error: 'Email is required' })
  .trim()
  .toLowerCase()
  .min(1, 'Email is required')
  .max(EMAIL_MAX_LENGTH, 'Email is too long')
  .refine(isValidEmail, 'Invalid email format');

export const passwordSchema = z
  .string({ required_error: 'Password is required' })
  .min(PASSWORD_MIN_LENGTH, `Password must be at least ${PASSWORD_MIN_LENGTH} characters`)
  .max(PASSWORD_MAX_LENGTH, `Password must be at most ${PASSWORD_MAX_LENGTH} characters`)
  .refine(
    (password) => /[A-Za-z]/.test(password) && /[0-9]/.test(password),
    'Password must contain at least one letter and one number'
  );

export const usernameSchema = z
  .string({ required_error: 'Username is required' })
  .trim()
  .min(USERNAME_MIN_LENGTH, `Username must be at least ${USERNAME_MIN_LENGTH} characters`)
  .max(USERNAME_MAX_LENGTH, `Username must be at most ${USERNAME_MAX_LENGTH} characters`)
  .regex(/^[A-Za-z0-9_-]+$/, 'Username may only contain letters, numbers, underscores and hyphens');

export const tokenSchema = z
  .string({ required_error: 'Token is required' })
  .min(1, 'Token is required')
  .max(256, 'Token is too long');

export const registerSchema = z.object({
  username: usernameSchema,
  email: emailSchema,
  password: passwordSchema,
});

export const loginSchema = z.object({
  email: emailSchema,
  password: z
    .string({ required_error: 'Password is required' })
    .min(1, 'Password is required')
    .max(PASSWORD_MAX_LENGTH, `Password must be at most ${PASSWORD_MAX_LENGTH} characters`),
});

export const emailOnlySchema = z.object({
  email: emailSchema,
});

export const resetPasswordSchema = z.object({
  token: tokenSchema,
  new_password: passwordSchema,
});

export const verifyEmailQuerySchema = z.object({
  token: tokenSchema,
});

export const changePasswordSchema = z.object({
  current_password: z
    .string({ required_error: 'Current password is required' })
    .min(1, 'Current password is required')
    .max(PASSWORD_MAX_LENGTH, `Password must be at most ${PASSWORD_MAX_LENGTH} characters`),
  new_password: passwordSchema,
});

export const updateProfileSchema = z.object({
  username: usernameSchema,
});

/**
 * First issue as "field: message"
 */
export function formatValidationError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'Invalid request';
  }
  const field = issue.path.join('.');
  return field ? `${field}: ${issue.message}` : issue.message;
}

/**
 * Hook for zValidator: reject with a validation_failure naming the first issue
 */
export function validationHook(result: { success: boolean; error?: ZodError }): void {
  if (!result.success) {
    throw ApiError.validation(result.error ? formatValidationError(result.error) : undefined);
  }
}
