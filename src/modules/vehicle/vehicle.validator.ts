import Joi from 'joi';
import { fuelTypes, transmissions, vehicleConditions } from '../../types/index.js';
import type { InStockFilter, NewVehicle } from './vehicle.repo.js';

export const vehicleIdSchema = Joi.object({
  id: Joi.number().integer().positive().required(),
});

export const createVehicleSchema = Joi.object<NewVehicle>({
  vin: Joi.string().trim().length(17).required().messages({
    'string.length': 'VIN must be 17 characters',
    'any.required': 'VIN is required',
  }),
  registrationNumber: Joi.string().trim().max(20).required(),
  make: Joi.string().trim().max(100).required(),
  model: Joi.string().trim().max(100).required(),
  year: Joi.number().integer().min(1950).max(2100).required(),
  version: Joi.string().max(100).allow('', null),
  mileage: Joi.number().integer().min(0).required(),
  fuelType: Joi.string().valid(...fuelTypes).required(),
  transmission: Joi.string().valid(...transmissions).required(),
  powerHp: Joi.number().integer().min(1).required(),
  engineCc: Joi.number().integer().min(0).allow(null),
  originalPurchasePrice: Joi.number().min(0).allow(null),
  currentMarketValue: Joi.number().min(0).required(),
  estimatedTradeInValue: Joi.number().min(0).allow(null),
  condition: Joi.string().valid(...vehicleConditions).required(),
  inStock: Joi.boolean(),
  stockLocation: Joi.string().max(100).allow('', null),
});

export const searchVehiclesSchema = Joi.object<InStockFilter>({
  fuelType: Joi.string().valid(...fuelTypes).allow(null),
  transmission: Joi.string().valid(...transmissions).allow(null),
  budgetMin: Joi.number().min(0).allow(null),
  budgetMax: Joi.number().min(0).allow(null),
}).custom((filter: InStockFilter, helpers) => {
  if (
    filter.budgetMin !== undefined &&
    filter.budgetMin !== null &&
    filter.budgetMax !== undefined &&
    filter.budgetMax !== null &&
    filter.budgetMin > filter.budgetMax
  ) {
    return helpers.message({ custom: 'budgetMin cannot exceed budgetMax' });
  }
  return filter;
});
