import { BirthdayWindow, Contact, ContactFilters, ContactInput } from '@/models';

/**
 * Contact Repository Interface
 *
 * Every method is scoped to the owner: a contact created by another user
 * is indistinguishable from a missing one.
 */
export interface IContactRepository {
  findContacts(userId: number, filters: ContactFilters): Promise<Contact[]>;

  /**
   * Contacts whose birth month is in window.months and birth day in window.days
   */
  findBirthdays(userId: number, window: BirthdayWindow): Promise<Contact[]>;

  findContactById(contactId: number, userId: number): Promise<Contact | null>;

  createContact(userId: number, input: ContactInput): Promise<Contact>;

  updateContact(contactId: number, userId: number, input: ContactInput): Promise<Contact | null>;

  removeContact(contactId: number, userId: number): Promise<Contact | null>;
}
