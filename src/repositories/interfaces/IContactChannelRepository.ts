import { ContactChannel, ContactChannelInput, Pagination } from '@/models';

/**
 * Contact Channel Repository Interface
 * Reads and writes are scoped to the owner (created_by).
 */
export interface IContactChannelRepository {
  findContactChannels(userId: number, pagination: Pagination): Promise<ContactChannel[]>;

  findContactChannelById(contactChannelId: number, userId: number): Promise<ContactChannel | null>;

  /**
   * Lookup across all users, channel values are globally unique
   */
  findContactChannelByValue(channelValue: string): Promise<ContactChannel | null>;

  createContactChannel(userId: number, input: ContactChannelInput): Promise<ContactChannel>;

  updateContactChannel(
    contactChannelId: number,
    userId: number,
    input: ContactChannelInput
  ): Promise<ContactChannel | null>;

  removeContactChannel(contactChannelId: number, userId: number): Promise<ContactChannel | null>;
}
