import {
  IChannelRepository,
  IContactChannelRepository,
  IContactRepository,
} from '@/repositories/interfaces';
import {
  ContactChannel,
  ContactChannelInput,
  CreateContactChannelResult,
  Pagination,
} from '@/models';
import { ConflictError, NotFoundError } from '@/errors';
import { isForeignKeyViolation, isUniqueViolation } from '@/config/database';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('ContactChannelService');

const DUPLICATE_VALUE_MESSAGE = 'Such channel value already exists in the DB';
const MISSING_REFERENCE_MESSAGE = 'Contact or channel name is not found';

/**
 * Contact Channel Service
 *
 * Links one of the caller's contacts to a channel with a value (an address,
 * a phone number). Values are unique across all users.
 */
export class ContactChannelService {
  constructor(
    private readonly contactChannelRepo: IContactChannelRepository,
    private readonly contactRepo: IContactRepository,
    private readonly channelRepo: IChannelRepository
  ) {}

  async listContactChannels(userId: number, pagination: Pagination): Promise<ContactChannel[]> {
    return this.contactChannelRepo.findContactChannels(userId, pagination);
  }

  async createContactChannel(userId: number, input: ContactChannelInput): Promise<CreateContactChannelResult> {
    const taken = await this.contactChannelRepo.findContactChannelByValue(input.channelValue);
    if (taken) {
      return { status: 'conflict' };
    }

    if (!(await this.referencesExist(userId, input))) {
      return { status: 'not_found' };
    }

    try {
      const contactChannel = await this.contactChannelRepo.createContactChannel(userId, input);
      logger.info({ userId, contactChannelId: contactChannel.id }, 'Contact channel created');
      return { status: 'created', contactChannel };
    } catch (error) {
      if (isUniqueViolation(error)) {
        return { status: 'conflict' };
      }
      if (isForeignKeyViolation(error)) {
        return { status: 'not_found' };
      }
      throw error;
    }
  }

  async updateContactChannel(
    userId: number,
    contactChannelId: number,
    input: ContactChannelInput
  ): Promise<ContactChannel> {
    const current = await this.contactChannelRepo.findContactChannelById(contactChannelId, userId);
    if (!current) {
      throw this.missing(contactChannelId);
    }

    const taken = await this.contactChannelRepo.findContactChannelByValue(input.channelValue);
    if (taken && taken.id !== contactChannelId) {
      throw new ConflictError(DUPLICATE_VALUE_MESSAGE);
    }

    if (!(await this.referencesExist(userId, input))) {
      throw new NotFoundError(MISSING_REFERENCE_MESSAGE);
    }

    let updated: ContactChannel | null;
    try {
      updated = await this.contactChannelRepo.updateContactChannel(contactChannelId, userId, input);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(DUPLICATE_VALUE_MESSAGE);
      }
      if (isForeignKeyViolation(error)) {
        throw new NotFoundError(MISSING_REFERENCE_MESSAGE);
      }
      throw error;
    }

    if (!updated) {
      throw this.missing(contactChannelId);
    }
    return updated;
  }

  async removeContactChannel(userId: number, contactChannelId: number): Promise<ContactChannel> {
    const removed = await this.contactChannelRepo.removeContactChannel(contactChannelId, userId);
    if (!removed) {
      throw this.missing(contactChannelId);
    }
    return removed;
  }

  /**
   * The contact must belong to the caller; channels are shared
   */
  private async referencesExist(userId: number, input: ContactChannelInput): Promise<boolean> {
    const [contact, channel] = await Promise.all([
      this.contactRepo.findContactById(input.contactId, userId),
      this.channelRepo.findChannelById(input.channelId),
    ]);
    return contact !== null && channel !== null;
  }

  private missing(contactChannelId: number): NotFoundError {
    return new NotFoundError(`Contact channel ${contactChannelId} is not found`);
  }
}
