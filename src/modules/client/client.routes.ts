import { Router } from 'express';
import { validateParams } from '../../middlewares/validate.js';
import { createClientController } from './client.controller.js';
import type { ClientService } from './client.service.js';
import { clientIdSchema } from './client.validator.js';

export function createClientRouter(service: ClientService): Router {
  const clientRouter = Router();
  const controller = createClientController(service);

  clientRouter.post('/', controller.createClient);
  clientRouter.get('/:id', validateParams(clientIdSchema), controller.getClient);
  clientRouter.get('/:id/negotiations', validateParams(clientIdSchema), controller.listNegotiations);

  return clientRouter;
}

export default createClientRouter;
