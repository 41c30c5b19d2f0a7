import { ChannelName } from '@/constants/channels';

/**
 * Channel model
 * Matches the 'channels' table schema. Shared by all users.
 */
export interface Channel {
  id: number;
  name: ChannelName;
}

export interface ChannelInput {
  name: ChannelName;
}
