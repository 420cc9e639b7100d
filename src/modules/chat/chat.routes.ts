import { Router } from 'express';
import { validateParams } from '../../middlewares/validate.js';
import { createChatController } from './chat.controller.js';
import type { ChatService } from './chat.service.js';
import { chatSessionIdSchema } from './chat.validator.js';

/**
 * Advisory chat routes, mounted under /api/chat
 */
export function createChatRouter(service: ChatService): Router {
  const chatRouter = Router();
  const controller = createChatController(service);

  chatRouter.post('/messages', controller.sendMessage);
  chatRouter.post('/price', controller.negotiatePrice);
  chatRouter.delete('/sessions/:sessionId', validateParams(chatSessionIdSchema), controller.clearSession);

  return chatRouter;
}

export default createChatRouter;
