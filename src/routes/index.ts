import { Router, type Request, type Response } from 'express';
import type { AppServices } from '../loaders/services.js';
import { createNegotiationRouter } from '../modules/negotiation/negotiation.routes.js';
import { createVehicleRouter } from '../modules/vehicle/vehicle.routes.js';
import { createClientRouter } from '../modules/client/client.routes.js';
import { createChatRouter } from '../modules/chat/chat.routes.js';

export function createRoutes(services: AppServices): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.use('/negotiation', createNegotiationRouter(services.negotiation));
  router.use('/vehicle', createVehicleRouter(services.vehicle));
  router.use('/client', createClientRouter(services.client));
  router.use('/chat', createChatRouter(services.chat));

  return router;
}

export default createRoutes;
