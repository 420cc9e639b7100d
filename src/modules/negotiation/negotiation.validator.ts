import Joi from 'joi';
import { MAX_DURATION_MONTHS, MIN_DURATION_MONTHS, offerKinds, type ProposedTerms } from '../../types/index.js';
import type { InitiateInput } from './negotiation.types.js';

export interface RoundBody {
  feedback: string;
  counterProposal?: ProposedTerms | null;
}

export interface ReasonBody {
  reason?: string;
}

export const negotiationIdSchema = Joi.object({
  id: Joi.string().guid({ version: 'uuidv4' }).required(),
});

export const offerIdSchema = Joi.object({
  offerId: Joi.number().integer().positive().required(),
});

export const initiateSchema = Joi.object<InitiateInput>({
  clientId: Joi.number().integer().positive().required().messages({
    'any.required': 'clientId is required',
  }),
  tradeInVehicleId: Joi.number().integer().positive().allow(null),
  targetVehicleId: Joi.number().integer().positive().allow(null),
  marginTarget: Joi.number().min(0).max(1),
});

const proposedTermsSchema = Joi.object<ProposedTerms>({
  kind: Joi.string().valid(...offerKinds),
  tradeInValue: Joi.number().min(0),
  purchasePrice: Joi.number().min(0),
  monthlyPayment: Joi.number().min(0),
  durationMonths: Joi.number().integer().min(MIN_DURATION_MONTHS).max(MAX_DURATION_MONTHS),
  totalCost: Joi.number().min(0),
  warrantyMonths: Joi.number().integer().min(0),
  maintenanceIncluded: Joi.boolean(),
  roadsideAssistance: Joi.boolean(),
  insuranceIncluded: Joi.boolean(),
});

export const roundSchema = Joi.object<RoundBody>({
  feedback: Joi.string().trim().min(1).max(5000).required().messages({
    'any.required': 'feedback is required',
    'string.empty': 'feedback cannot be empty',
  }),
  counterProposal: proposedTermsSchema.allow(null),
});

export const reasonSchema = Joi.object<ReasonBody>({
  reason: Joi.string().trim().max(1000),
});
