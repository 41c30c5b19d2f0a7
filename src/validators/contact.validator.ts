import { z } from 'zod';
import { CONTACT_LIMITS } from '@/config/businessRules';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * YYYY-MM-DD that names a real calendar day
 */
function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;

  const [, year, month, day] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined) return false;

  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function todayIso(): string {
  const now = new Date();
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/**
 * Contact body for POST and PUT
 *
 * Business rules:
 * - birthdate must be a past date (ISO strings compare chronologically)
 * - birthdate and persuasion may be omitted or null
 */
export const contactSchema = z.object({
  firstName: z.string().trim().min(1).max(CONTACT_LIMITS.MAX_NAME_LENGTH),
  lastName: z.string().trim().min(1).max(CONTACT_LIMITS.MAX_NAME_LENGTH),
  birthdate: z
    .string()
    .refine(isCalendarDate, { message: 'Birthdate must be a valid YYYY-MM-DD date' })
    .refine((value) => value < todayIso(), { message: 'Birthdate must be in the past' })
    .nullish()
    .transform((value) => value ?? null),
  gender: z.string().length(CONTACT_LIMITS.GENDER_LENGTH),
  persuasion: z
    .string()
    .max(CONTACT_LIMITS.MAX_PERSUASION_LENGTH)
    .nullish()
    .transform((value) => value ?? null),
});

export const contactFiltersSchema = z.object({
  firstName: z.string().min(1).optional(),
  lastName: z.string().min(1).optional(),
  email: z.string().min(1).optional(),
});

export const birthdaysQuerySchema = z.object({
  daysForward: z.coerce
    .number()
    .int()
    .min(0)
    .max(CONTACT_LIMITS.MAX_BIRTHDAY_DAYS_FORWARD, {
      message: `daysForward cannot exceed ${CONTACT_LIMITS.MAX_BIRTHDAY_DAYS_FORWARD}`,
    }),
});

export type ContactDTO = z.infer<typeof contactSchema>;
