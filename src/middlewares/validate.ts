import type { Request, Response, NextFunction, RequestHandler } from 'express';
import Joi from 'joi';
import { ValidationError } from '../utils/custom-error.js';

const options: Joi.ValidationOptions = {
  abortEarly: false,
  stripUnknown: true,
  errors: {
    wrap: {
      label: '',
    },
  },
};

/**
 * Validates and converts `input`, throwing a ValidationError listing every problem.
 */
export function validateInput<T>(schema: Joi.ObjectSchema<T>, input: unknown): T {
  const { error, value } = schema.validate(input, options);
  if (error) {
    throw new ValidationError(
      'Validation error',
      error.details.map((detail) => detail.message)
    );
  }
  return value;
}

/**
 * Rejects requests whose route params do not match `schema`.
 */
export const validateParams =
  (schema: Joi.ObjectSchema): RequestHandler =>
  (req: Request, _res: Response, next: NextFunction): void => {
    const { error } = schema.validate(req.params, options);
    if (error) {
      next(new ValidationError('Validation error', error.details.map((detail) => detail.message)));
      return;
    }
    next();
  };
