import { Request, Response, NextFunction } from 'express';
import { ChannelService } from '@/services/channel.service';
import { channelSchema } from '@/validators/channel.validator';
import { idParamSchema, validate } from '@/validators/validate';

/**
 * Channels Controller
 */
export function createChannelsController(channelService: ChannelService) {
  async function listChannels(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.json(await channelService.listChannels());
    } catch (error) {
      next(error);
    }
  }

  async function getChannel(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const channelId = validate(idParamSchema, req.params.channelId, 'Invalid channel ID');
      res.json(await channelService.getChannel(channelId));
    } catch (error) {
      next(error);
    }
  }

  async function createChannel(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input = validate(channelSchema, req.body, 'Invalid channel data');
      res.json(await channelService.createChannel(input));
    } catch (error) {
      next(error);
    }
  }

  async function updateChannel(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const channelId = validate(idParamSchema, req.params.channelId, 'Invalid channel ID');
      const input = validate(channelSchema, req.body, 'Invalid channel data');
      res.json(await channelService.updateChannel(channelId, input));
    } catch (error) {
      next(error);
    }
  }

  async function removeChannel(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const channelId = validate(idParamSchema, req.params.channelId, 'Invalid channel ID');
      res.json(await channelService.removeChannel(channelId));
    } catch (error) {
      next(error);
    }
  }

  return { listChannels, getChannel, createChannel, updateChannel, removeChannel };
}
