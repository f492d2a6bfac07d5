import { NextFunction, Request, Response } from 'express';
import { ZodError, ZodSchema } from 'zod';
import { logger } from '../config/logger';

export interface ValidationIssue {
  field: string;
  message: string;
  code?: string;
}

export function formatZodErrors(error: ZodError): ValidationIssue[] {
  return error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code
  }));
}

/**
 * Replace req.body with the parsed value, or answer 400
 */
export function validate<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const parsed = schema.safeParse(req.body);
    if (parsed.success) {
      req.body = parsed.data;
      next();
      return;
    }

    const details = formatZodErrors(parsed.error);
    logger.warn('Request validation failed', {
      endpoint: req.path,
      method: req.method,
      errors: details
    });

    res.status(400).json({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details
      },
      timestamp: new Date().toISOString(),
      requestId: req.id
    });
  };
}
