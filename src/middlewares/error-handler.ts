import type { Request, Response, NextFunction } from 'express';
import logger from '../config/logger.js';
import { CustomError, NotFoundError, PersistenceError } from '../utils/custom-error.js';

interface RequestBody {
  [key: string]: unknown;
}

interface ErrorResponse {
  message: string;
  details?: unknown;
  roundNumber?: number;
}

const sensitiveFields = ['password', 'apiSecret', 'apiKey', 'token', 'authorization'];

export const sanitizeRequestBody = (body: unknown): RequestBody | undefined => {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return undefined;
  const sanitized: RequestBody = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = sensitiveFields.includes(key) && value ? '[REDACTED]' : value;
  }
  return sanitized;
};

/** Express marks malformed JSON bodies with `type: 'entity.parse.failed'`. */
const isBodyParseError = (err: Error): boolean =>
  'type' in err && err.type === 'entity.parse.failed';

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.originalUrl} not found`));
};

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  let statusCode = 500;
  const response: ErrorResponse = { message: err.message || 'Internal Server Error' };

  if (err instanceof CustomError) {
    statusCode = err.statusCode;
    if (err.details !== undefined) {
      response.details = err.details;
    }
  } else if (isBodyParseError(err)) {
    statusCode = 400;
    response.message = 'Malformed JSON body';
  }

  if (err instanceof PersistenceError && err.roundNumber !== undefined) {
    response.roundNumber = err.roundNumber;
  }

  const errorLog = {
    error: {
      message: err.message,
      name: err.name,
      statusCode,
      stack: statusCode >= 500 ? err.stack : undefined,
      details: err instanceof CustomError ? err.details : undefined,
    },
    request: {
      method: req.method,
      url: req.originalUrl,
      params: req.params,
      query: req.query,
      body: sanitizeRequestBody(req.body),
      ip: req.ip || req.socket.remoteAddress,
    },
  };

  if (statusCode >= 500) {
    logger.error('API Error (5xx):', errorLog);
  } else {
    logger.warn('API Error (4xx):', errorLog);
  }

  res.status(statusCode).json(response);
};
