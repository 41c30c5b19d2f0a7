import { z } from 'zod';
import { CONTACT_LIMITS, PAGINATION_LIMITS } from '@/config/businessRules';
import { idSchema } from './validate';

export const contactChannelSchema = z.object({
  contactId: idSchema,
  channelId: idSchema,
  channelValue: z.string().trim().min(1).max(CONTACT_LIMITS.MAX_CHANNEL_VALUE_LENGTH),
});

export const paginationQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(PAGINATION_LIMITS.DEFAULT_SKIP),
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(PAGINATION_LIMITS.MAX_PAGE_SIZE, {
      message: `limit cannot exceed ${PAGINATION_LIMITS.MAX_PAGE_SIZE}`,
    })
    .default(PAGINATION_LIMITS.DEFAULT_PAGE_SIZE),
});

export type ContactChannelDTO = z.infer<typeof contactChannelSchema>;
