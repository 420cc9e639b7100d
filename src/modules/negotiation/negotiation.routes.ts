import { Router } from 'express';
import { validateParams } from '../../middlewares/validate.js';
import { createNegotiationController } from './negotiation.controller.js';
import type { NegotiationService } from './negotiation.service.js';
import { negotiationIdSchema, offerIdSchema } from './negotiation.validator.js';

/**
 * Negotiation routes, mounted under /api/negotiation
 */
export function createNegotiationRouter(service: NegotiationService): Router {
  const negotiationRouter = Router();
  const controller = createNegotiationController(service);

  negotiationRouter.post('/initiate', controller.initiate);

  negotiationRouter.post('/offers/:offerId/accept', validateParams(offerIdSchema), controller.acceptOffer);
  negotiationRouter.post('/offers/:offerId/reject', validateParams(offerIdSchema), controller.rejectOffer);

  negotiationRouter.get('/:id', validateParams(negotiationIdSchema), controller.getNegotiation);
  negotiationRouter.post('/:id/rounds', validateParams(negotiationIdSchema), controller.executeRound);
  negotiationRouter.get('/:id/history', validateParams(negotiationIdSchema), controller.getHistory);
  negotiationRouter.get('/:id/analysis', validateParams(negotiationIdSchema), controller.getAnalysis);
  negotiationRouter.post('/:id/cancel', validateParams(negotiationIdSchema), controller.cancel);

  return negotiationRouter;
}

export default createNegotiationRouter;
