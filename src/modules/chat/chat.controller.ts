import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { validateInput } from '../../middlewares/validate.js';
import type { ChatService } from './chat.service.js';
import { negotiatePriceSchema, sendMessageSchema } from './chat.validator.js';

export interface ChatController {
  sendMessage: RequestHandler;
  negotiatePrice: RequestHandler;
  clearSession: RequestHandler;
}

export function createChatController(service: ChatService): ChatController {
  return {
    sendMessage: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const input = validateInput(sendMessageSchema, req.body);
        const data = await service.sendMessage(input);
        res.status(200).json({ message: 'Message answered', data });
      } catch (error) {
        next(error);
      }
    },

    /**
     * Quick fair-price check for one vehicle, outside any negotiation session
     */
    negotiatePrice: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const input = validateInput(negotiatePriceSchema, req.body);
        const data = await service.negotiatePrice(input);
        res.status(200).json({ message: 'Price negotiated', data });
      } catch (error) {
        next(error);
      }
    },

    clearSession: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.clearSession(req.params.sessionId);
        res.status(200).json({ message: `Session ${data.sessionId} cleared`, data });
      } catch (error) {
        next(error);
      }
    },
  };
}
