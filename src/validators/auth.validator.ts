import { z } from 'zod';
import { CREDENTIAL_LIMITS } from '@/config/businessRules';

/**
 * Signup and login body
 */
export const credentialsSchema = z.object({
  email: z
    .string()
    .trim()
    .email()
    .max(CREDENTIAL_LIMITS.MAX_EMAIL_LENGTH, {
      message: `Email cannot exceed ${CREDENTIAL_LIMITS.MAX_EMAIL_LENGTH} characters`,
    }),
  password: z
    .string()
    .min(CREDENTIAL_LIMITS.MIN_PASSWORD_LENGTH, {
      message: `Password must be at least ${CREDENTIAL_LIMITS.MIN_PASSWORD_LENGTH} characters`,
    })
    .max(CREDENTIAL_LIMITS.MAX_PASSWORD_LENGTH, {
      message: `Password cannot exceed ${CREDENTIAL_LIMITS.MAX_PASSWORD_LENGTH} characters`,
    }),
});

export const emailParamSchema = z.string().trim().email().max(CREDENTIAL_LIMITS.MAX_EMAIL_LENGTH);

export type CredentialsDTO = z.infer<typeof credentialsSchema>;
