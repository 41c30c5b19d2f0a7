import { z } from 'zod';
import { CHANNEL_NAME_VALUES } from '@/constants/channels';

export const channelSchema = z.object({
  name: z.enum(CHANNEL_NAME_VALUES),
});

export type ChannelDTO = z.infer<typeof channelSchema>;
