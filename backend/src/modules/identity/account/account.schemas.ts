/**
 * src/modules/identity/account/account.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the /Account endpoints.
 * - The same schemas read JSON bodies and urlencoded form posts, so booleans
 *   accept true/"true"/"on" and optional strings accept "" as absent.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Password strength is NOT checked here (UserManager owns the password policy,
 *   so JSON and form clients get the same IdentityResult errors).
 */

import { z } from 'zod';

const FormBoolean = z
  .union([z.boolean(), z.enum(['true', 'false', 'on'])])
  .optional()
  .transform((v) => v === true || v === 'true' || v === 'on');

const OptionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v));

const Email = z.string().trim().email('The Email field is not a valid e-mail address.');
const Required = (field: string) => z.string().min(1, `The ${field} field is required.`);

const PASSWORD_MISMATCH = 'The password and confirmation password do not match.';

export const registerSchema = z
  .object({
    email: Email,
    password: Required('Password'),
    confirmPassword: z.string(),
    returnUrl: OptionalText,
  })
  .refine((b) => b.password === b.confirmPassword, { message: PASSWORD_MISMATCH, path: ['confirmPassword'] });

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: Email,
  password: Required('Password'),
  rememberMe: FormBoolean,
  returnUrl: OptionalText,
});

export type LoginInput = z.infer<typeof loginSchema>;

export const loginWith2faSchema = z.object({
  // Spaces and dashes are allowed; the authenticator provider strips them.
  twoFactorCode: z.string().min(6, 'The Authenticator code must be at least 6 characters long.').max(9),
  rememberMe: FormBoolean,
  returnUrl: OptionalText,
});

export const loginWithRecoveryCodeSchema = z.object({
  recoveryCode: Required('Recovery Code'),
  returnUrl: OptionalText,
});

export const logoutSchema = z.object({
  returnUrl: OptionalText,
});

export const emailOnlySchema = z.object({
  email: Email,
});

export const resetPasswordSchema = z
  .object({
    email: Email,
    password: Required('Password'),
    confirmPassword: z.string(),
    code: Required('Code'),
  })
  .refine((b) => b.password === b.confirmPassword, { message: PASSWORD_MISMATCH, path: ['confirmPassword'] });

export const confirmEmailQuerySchema = z.object({
  userId: z.string().min(1),
  code: z.string().min(1),
  returnUrl: OptionalText,
});

export const confirmEmailChangeQuerySchema = z.object({
  userId: z.string().min(1),
  email: Email,
  code: z.string().min(1),
});

// ── Manage ───────────────────────────────────────────────────

export const updateProfileSchema = z.object({
  // "" and null clear the number.
  phoneNumber: z
    .union([z.string(), z.null()])
    .optional()
    .transform((v) => (v ? v.trim() || undefined : undefined))
    .pipe(
      z
        .string()
        .regex(/^[+]?[\d\s().-]{3,32}$/, 'The Phone number field is not a valid phone number.')
        .optional(),
    ),
});

export const changeEmailSchema = z.object({
  newEmail: Email,
});

export const changePasswordSchema = z
  .object({
    oldPassword: Required('Current password'),
    newPassword: Required('New password'),
    confirmPassword: z.string(),
  })
  .refine((b) => b.newPassword === b.confirmPassword, {
    message: 'The new password and confirmation password do not match.',
    path: ['confirmPassword'],
  });

export const enableAuthenticatorSchema = z.object({
  code: z.string().min(6, 'The Verification Code must be at least 6 characters long.').max(9),
});

export const deletePersonalDataSchema = z.object({
  password: OptionalText,
});
