import crypto from 'crypto';
import { NextFunction, Request, Response } from 'express';
import { logger } from '../config/logger';

declare global {
  namespace Express {
    interface Request {
      id?: string;
    }
  }
}

export const generateRequestId = (): string => crypto.randomBytes(16).toString('hex');

export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : generateRequestId();
  req.id = requestId;
  res.setHeader('X-Request-Id', requestId);
  next();
};

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const logData = {
      requestId: req.id,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration}ms`
    };

    if (duration > 5000) {
      logger.warn('Slow request detected', logData);
    } else {
      logger.debug('Request completed', logData);
    }
  });

  next();
};
