import Joi from 'joi';
import type { NegotiatePriceInput, SendMessageInput } from './chat.service.js';

const sessionId = Joi.string()
  .trim()
  .max(64)
  .pattern(/^[A-Za-z0-9_-]+$/)
  .messages({ 'string.pattern.base': 'sessionId may only contain letters, digits, dashes and underscores' });

export const chatSessionIdSchema = Joi.object({
  sessionId: sessionId.required(),
});

export const sendMessageSchema = Joi.object<SendMessageInput>({
  message: Joi.string().trim().min(1).max(5000).required().messages({
    'any.required': 'message is required',
    'string.empty': 'message cannot be empty',
  }),
  sessionId,
});

export const negotiatePriceSchema = Joi.object<NegotiatePriceInput>({
  vehicleId: Joi.number().integer().positive().required(),
  proposedPrice: Joi.number().positive().required(),
  sessionId,
});
