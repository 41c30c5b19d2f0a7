import { Request, Response, NextFunction } from 'express';
import { ContactService } from '@/services/contact.service';
import { birthdaysQuerySchema, contactFiltersSchema, contactSchema } from '@/validators/contact.validator';
import { idParamSchema, validate } from '@/validators/validate';
import { currentUser } from '@/middlewares/requireAuth';

/**
 * Contacts Controller
 * Handles HTTP requests for the caller's contacts
 */
export function createContactsController(contactService: ContactService) {
  /**
   * GET /api/contacts?firstName=&lastName=&email=
   */
  async function listContacts(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const filters = validate(contactFiltersSchema, req.query, 'Invalid contact filters');
      const contacts = await contactService.listContacts(currentUser(req).id, filters);

      res.json(contacts);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/contacts/birthdays?daysForward=7
   */
  async function listBirthdays(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { daysForward } = validate(birthdaysQuerySchema, req.query, 'Invalid daysForward');
      const contacts = await contactService.listBirthdays(currentUser(req).id, daysForward);

      res.json(contacts);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/contacts/:contactId
   */
  async function getContact(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const contactId = validate(idParamSchema, req.params.contactId, 'Invalid contact ID');
      const contact = await contactService.getContact(currentUser(req).id, contactId);

      res.json(contact);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/contacts
   */
  async function createContact(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input = validate(contactSchema, req.body, 'Invalid contact data');
      const contact = await contactService.createContact(currentUser(req).id, input);

      res.json(contact);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/contacts/:contactId
   */
  async function updateContact(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const contactId = validate(idParamSchema, req.params.contactId, 'Invalid contact ID');
      const input = validate(contactSchema, req.body, 'Invalid contact data');
      const contact = await contactService.updateContact(currentUser(req).id, contactId, input);

      res.json(contact);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/contacts/:contactId
   */
  async function removeContact(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const contactId = validate(idParamSchema, req.params.contactId, 'Invalid contact ID');
      const contact = await contactService.removeContact(currentUser(req).id, contactId);

      res.json(contact);
    } catch (error) {
      next(error);
    }
  }

  return { listContacts, listBirthdays, getContact, createContact, updateContact, removeContact };
}
