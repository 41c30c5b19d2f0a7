import { RequestHandler, Router } from 'express';
import { createContactsController } from '@/controllers/contacts.controller';
import { ContactService } from '@/services/contact.service';

/**
 * Contacts routes (/api/contacts)
 * /birthdays is registered before /:contactId so it is not read as an id
 */
export function createContactsRoutes(
  contactService: ContactService,
  gate: RequestHandler[],
  auth: RequestHandler
): Router {
  const router = Router();
  const controller = createContactsController(contactService);

  router.get('/', gate, auth, controller.listContacts);
  router.get('/birthdays', gate, auth, controller.listBirthdays);
  router.get('/:contactId', gate, auth, controller.getContact);
  router.post('/', gate, auth, controller.createContact);
  router.put('/:contactId', gate, auth, controller.updateContact);
  router.delete('/:contactId', gate, auth, controller.removeContact);

  return router;
}
