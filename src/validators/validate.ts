import { z } from 'zod';
import { ValidationError } from '@/errors';
import { ID_LIMITS } from '@/config/businessRules';

/**
 * Parse request input or throw a 422 with the flattened zod issues
 */
export function validate<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, result.error.flatten());
  }
  return result.data;
}

/**
 * Positive integer path parameter (":contactId", ":channelId")
 */
export const idSchema = z.number().int().positive().max(ID_LIMITS.MAX_ID);

export const idParamSchema = z.coerce.number().pipe(idSchema);
