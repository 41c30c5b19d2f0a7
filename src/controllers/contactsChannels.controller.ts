import { Request, Response, NextFunction } from 'express';
import { ContactChannelService } from '@/services/contactChannel.service';
import { contactChannelSchema, paginationQuerySchema } from '@/validators/contactChannel.validator';
import { idParamSchema, validate } from '@/validators/validate';
import { ConflictError, NotFoundError } from '@/errors';
import { currentUser } from '@/middlewares/requireAuth';

/**
 * Contacts Channels Controller
 * Handles HTTP requests linking the caller's contacts to channels
 */
export function createContactsChannelsController(contactChannelService: ContactChannelService) {
  /**
   * GET /api/contactsChannels?skip=0&limit=100
   */
  async function listContactChannels(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const pagination = validate(paginationQuerySchema, req.query, 'Invalid pagination');
      const contactChannels = await contactChannelService.listContactChannels(currentUser(req).id, pagination);

      res.json(contactChannels);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/contactsChannels
   */
  async function createContactChannel(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input = validate(contactChannelSchema, req.body, 'Invalid contact channel data');
      const result = await contactChannelService.createContactChannel(currentUser(req).id, input);

      switch (result.status) {
        case 'created':
          res.json(result.contactChannel);
          return;
        case 'conflict':
          throw new ConflictError('Such channel value already exists in the DB');
        case 'not_found':
          throw new NotFoundError('Contact or channel name is not found');
      }
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/contactsChannels/:contactChannelId
   */
  async function updateContactChannel(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const contactChannelId = validate(idParamSchema, req.params.contactChannelId, 'Invalid contact channel ID');
      const input = validate(contactChannelSchema, req.body, 'Invalid contact channel data');
      const contactChannel = await contactChannelService.updateContactChannel(
        currentUser(req).id,
        contactChannelId,
        input
      );

      res.json(contactChannel);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/contactsChannels/:contactChannelId
   */
  async function removeContactChannel(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const contactChannelId = validate(idParamSchema, req.params.contactChannelId, 'Invalid contact channel ID');
      const contactChannel = await contactChannelService.removeContactChannel(currentUser(req).id, contactChannelId);

      res.json(contactChannel);
    } catch (error) {
      next(error);
    }
  }

  return { listContactChannels, createContactChannel, updateContactChannel, removeContactChannel };
}
