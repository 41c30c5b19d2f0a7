import { RequestHandler, Router } from 'express';
import { createContactsChannelsController } from '@/controllers/contactsChannels.controller';
import { ContactChannelService } from '@/services/contactChannel.service';

/**
 * Contacts channels routes (/api/contactsChannels)
 */
export function createContactsChannelsRoutes(
  contactChannelService: ContactChannelService,
  gate: RequestHandler[],
  auth: RequestHandler
): Router {
  const router = Router();
  const controller = createContactsChannelsController(contactChannelService);

  router.get('/', gate, auth, controller.listContactChannels);
  router.post('/', gate, auth, controller.createContactChannel);
  router.put('/:contactChannelId', gate, auth, controller.updateContactChannel);
  router.delete('/:contactChannelId', gate, auth, controller.removeContactChannel);

  return router;
}
