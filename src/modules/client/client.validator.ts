import Joi from 'joi';
import { fuelTypes, offerPreferences, transmissions } from '../../types/index.js';
import type { NewClient } from './client.repo.js';

export const clientIdSchema = Joi.object({
  id: Joi.number().integer().positive().required(),
});

export const createClientSchema = Joi.object<NewClient>({
  firstName: Joi.string().trim().max(100).required(),
  lastName: Joi.string().trim().max(100).required(),
  email: Joi.string().email().required().messages({
    'string.email': 'Email format is invalid',
    'any.required': 'Email is required',
  }),
  phone: Joi.string().max(20).allow('', null),
  address: Joi.string().max(500).allow('', null),
  city: Joi.string().max(100).allow('', null),
  postalCode: Joi.string().max(20).allow('', null),
  preferredFuel: Joi.string().valid(...fuelTypes).allow(null),
  preferredTransmission: Joi.string().valid(...transmissions).allow(null),
  budgetMin: Joi.number().min(0).allow(null),
  budgetMax: Joi.number().min(0).allow(null),
  offerPreference: Joi.string().valid(...offerPreferences),
  loyaltyScore: Joi.number().min(0).max(1),
  riskScore: Joi.number().min(0).max(1),
});
