import { Channel, ChannelInput } from '@/models';

/**
 * Channel Repository Interface
 * Channels are shared reference data, there is no owner filter.
 */
export interface IChannelRepository {
  findChannels(): Promise<Channel[]>;

  findChannelById(channelId: number): Promise<Channel | null>;

  findChannelByName(name: string): Promise<Channel | null>;

  createChannel(input: ChannelInput): Promise<Channel>;

  updateChannel(channelId: number, input: ChannelInput): Promise<Channel | null>;

  /**
   * Rejects with a foreign key violation while contact channels still reference it
   */
  removeChannel(channelId: number): Promise<Channel | null>;
}
