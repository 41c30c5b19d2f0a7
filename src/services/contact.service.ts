import { IContactRepository } from '@/repositories/interfaces';
import { Contact, ContactFilters, ContactInput } from '@/models';
import { NotFoundError } from '@/errors';
import { futureWindow } from '@/utils/dates';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('ContactService');

/**
 * Contact Service
 * Contacts are private to their creator; every lookup is scoped by userId.
 */
export class ContactService {
  constructor(private readonly contactRepo: IContactRepository) {}

  async listContacts(userId: number, filters: ContactFilters): Promise<Contact[]> {
    return this.contactRepo.findContacts(userId, filters);
  }

  /**
   * Contacts with a birthday between today and today + daysForward
   * The month/day filter is coarse across month boundaries (see futureWindow).
   */
  async listBirthdays(userId: number, daysForward: number, today: Date = new Date()): Promise<Contact[]> {
    const window = futureWindow(daysForward, today);

    return this.contactRepo.findBirthdays(userId, {
      months: [...window.months],
      days: [...window.days],
    });
  }

  async getContact(userId: number, contactId: number): Promise<Contact> {
    const contact = await this.contactRepo.findContactById(contactId, userId);
    if (!contact) {
      throw new NotFoundError('Contact not found');
    }
    return contact;
  }

  async createContact(userId: number, input: ContactInput): Promise<Contact> {
    const contact = await this.contactRepo.createContact(userId, input);
    logger.info({ userId, contactId: contact.id }, 'Contact created');
    return contact;
  }

  async updateContact(userId: number, contactId: number, input: ContactInput): Promise<Contact> {
    const contact = await this.contactRepo.updateContact(contactId, userId, input);
    if (!contact) {
      throw new NotFoundError('Contact not found');
    }
    return contact;
  }

  async removeContact(userId: number, contactId: number): Promise<Contact> {
    const contact = await this.contactRepo.removeContact(contactId, userId);
    if (!contact) {
      throw new NotFoundError('Contact not found');
    }
    logger.info({ userId, contactId }, 'Contact removed');
    return contact;
  }
}
