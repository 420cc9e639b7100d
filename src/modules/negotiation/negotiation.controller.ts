import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { validateInput } from '../../middlewares/validate.js';
import type { NegotiationService } from './negotiation.service.js';
import { initiateSchema, reasonSchema, roundSchema } from './negotiation.validator.js';

export interface NegotiationController {
  initiate: RequestHandler;
  getNegotiation: RequestHandler;
  executeRound: RequestHandler;
  getHistory: RequestHandler;
  getAnalysis: RequestHandler;
  cancel: RequestHandler;
  acceptOffer: RequestHandler;
  rejectOffer: RequestHandler;
}

export function createNegotiationController(service: NegotiationService): NegotiationController {
  return {
    /**
     * Start a negotiation for a client
     */
    initiate: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const input = validateInput(initiateSchema, req.body);
        const data = await service.initiate(input);
        res.status(201).json({ message: 'Negotiation initiated', data });
      } catch (error) {
        next(error);
      }
    },

    getNegotiation: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.getDetails(req.params.id);
        res.status(200).json({ message: 'Negotiation', data });
      } catch (error) {
        next(error);
      }
    },

    /**
     * Run one round against the customer's feedback
     */
    executeRound: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const body = validateInput(roundSchema, req.body);
        const data = await service.executeRound(req.params.id, body.feedback, body.counterProposal ?? null);
        res.status(200).json({ message: 'Round processed', data });
      } catch (error) {
        next(error);
      }
    },

    getHistory: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.getHistory(req.params.id);
        res.status(200).json({ message: 'Negotiation history', data });
      } catch (error) {
        next(error);
      }
    },

    getAnalysis: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.getAnalysis(req.params.id);
        res.status(200).json({ message: 'Negotiation analysis', data });
      } catch (error) {
        next(error);
      }
    },

    cancel: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const body = validateInput(reasonSchema, req.body ?? {});
        const data = await service.cancel(req.params.id, body.reason);
        res.status(200).json({ message: 'Negotiation cancelled', data });
      } catch (error) {
        next(error);
      }
    },

    acceptOffer: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.acceptOffer(Number(req.params.offerId));
        res.status(200).json({ message: 'Offer accepted', data });
      } catch (error) {
        next(error);
      }
    },

    rejectOffer: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const body = validateInput(reasonSchema, req.body ?? {});
        const data = await service.rejectOffer(Number(req.params.offerId), body.reason);
        res.status(200).json({ message: 'Offer rejected', data });
      } catch (error) {
        next(error);
      }
    },
  };
}
