import { IChannelRepository } from '@/repositories/interfaces';
import { Channel, ChannelInput } from '@/models';
import { ConflictError, NotFoundError } from '@/errors';
import { isForeignKeyViolation, isUniqueViolation } from '@/config/database';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('ChannelService');

/**
 * Channel Service
 * Channels are shared reference data with unique names.
 */
export class ChannelService {
  constructor(private readonly channelRepo: IChannelRepository) {}

  async listChannels(): Promise<Channel[]> {
    return this.channelRepo.findChannels();
  }

  async getChannel(channelId: number): Promise<Channel> {
    const channel = await this.channelRepo.findChannelById(channelId);
    if (!channel) {
      throw new NotFoundError('Channel not found');
    }
    return channel;
  }

  async createChannel(input: ChannelInput): Promise<Channel> {
    const existing = await this.channelRepo.findChannelByName(input.name);
    if (existing) {
      throw this.duplicateName(input.name);
    }

    try {
      const channel = await this.channelRepo.createChannel(input);
      logger.info({ channelId: channel.id, name: channel.name }, 'Channel created');
      return channel;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw this.duplicateName(input.name);
      }
      throw error;
    }
  }

  async updateChannel(channelId: number, input: ChannelInput): Promise<Channel> {
    const sameName = await this.channelRepo.findChannelByName(input.name);
    if (sameName && sameName.id !== channelId) {
      throw this.duplicateName(input.name);
    }

    let channel: Channel | null;
    try {
      channel = await this.channelRepo.updateChannel(channelId, input);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw this.duplicateName(input.name);
      }
      throw error;
    }

    if (!channel) {
      throw new NotFoundError('Channel not found');
    }
    return channel;
  }

  async removeChannel(channelId: number): Promise<Channel> {
    let channel: Channel | null;
    try {
      channel = await this.channelRepo.removeChannel(channelId);
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new ConflictError('Channel is used by contact channels and cannot be removed');
      }
      throw error;
    }

    if (!channel) {
      throw new NotFoundError('Channel not found');
    }
    logger.info({ channelId }, 'Channel removed');
    return channel;
  }

  private duplicateName(name: string): ConflictError {
    return new ConflictError(`Channel with the name '${name}' already exists`);
  }
}
