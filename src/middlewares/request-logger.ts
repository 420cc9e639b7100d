import type { Request, Response, NextFunction } from 'express';
import logger from '../config/logger.js';
import { sanitizeRequestBody } from './error-handler.js';

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const logData = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      ip: req.ip || req.socket.remoteAddress,
      // Request details only for failed requests
      ...(res.statusCode >= 400
        ? {
            request: {
              params: req.params,
              query: req.query,
              body: sanitizeRequestBody(req.body),
            },
          }
        : {}),
    };

    const message = `${req.method} ${req.originalUrl} ${res.statusCode} - ${duration}ms`;

    if (res.statusCode >= 500) {
      logger.error(message, logData);
    } else if (res.statusCode >= 400) {
      logger.warn(message, logData);
    } else {
      logger.info(message, logData);
    }
  });

  next();
};
