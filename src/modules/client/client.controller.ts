import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { validateInput } from '../../middlewares/validate.js';
import type { ClientService } from './client.service.js';
import { createClientSchema } from './client.validator.js';

export interface ClientController {
  createClient: RequestHandler;
  getClient: RequestHandler;
  listNegotiations: RequestHandler;
}

export function createClientController(service: ClientService): ClientController {
  return {
    createClient: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.createClient(validateInput(createClientSchema, req.body));
        res.status(201).json({ message: 'Client created successfully', data });
      } catch (error) {
        next(error);
      }
    },

    getClient: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.getClient(Number(req.params.id));
        res.status(200).json({ message: 'Client', data });
      } catch (error) {
        next(error);
      }
    },

    listNegotiations: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.listNegotiations(Number(req.params.id));
        res.status(200).json({ message: 'Client negotiations', data });
      } catch (error) {
        next(error);
      }
    },
  };
}
