import { RequestHandler, Router } from 'express';
import { createChannelsController } from '@/controllers/channels.controller';
import { ChannelService } from '@/services/channel.service';

/**
 * Channels routes (/api/channels)
 */
export function createChannelsRoutes(
  channelService: ChannelService,
  gate: RequestHandler[],
  auth: RequestHandler
): Router {
  const router = Router();
  const controller = createChannelsController(channelService);

  router.get('/', gate, auth, controller.listChannels);
  router.get('/:channelId', gate, auth, controller.getChannel);
  router.post('/', gate, auth, controller.createChannel);
  router.put('/:channelId', gate, auth, controller.updateChannel);
  router.delete('/:channelId', gate, auth, controller.removeChannel);

  return router;
}
