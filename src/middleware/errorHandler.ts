import { NextFunction, Request, Response } from 'express';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { AgentError, AgentErrorCode } from '../types';

export class ApiError extends Error {
  statusCode: number;
  isOperational: boolean;
  code: string;
  details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown, code = 'ERROR', isOperational = true) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

const STATUS_FOR_CODE: Partial<Record<AgentErrorCode, number>> = {
  [AgentErrorCode.UNKNOWN_SESSION]: 404,
  [AgentErrorCode.UNKNOWN_AGENT_TYPE]: 404,
  [AgentErrorCode.APPROVAL_MISMATCH]: 409,
  [AgentErrorCode.AGENT_DISABLED]: 409
};

/**
 * Agent errors become operational API errors with a mapped status
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof AgentError) {
    return new ApiError(STATUS_FOR_CODE[error.code] ?? 400, error.message, error.details, error.code);
  }
  if (error instanceof SyntaxError && 'body' in error) {
    return new ApiError(400, 'Malformed JSON body', undefined, 'INVALID_JSON');
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ApiError(500, message, undefined, 'INTERNAL_ERROR', false);
}

interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    stack?: string[];
  };
  timestamp: string;
  requestId?: string;
}

const formatErrorResponse = (error: ApiError, requestId?: string): ErrorBody => {
  const isProduction = env.NODE_ENV === 'production';
  const body: ErrorBody = {
    success: false,
    error: {
      code: error.code,
      message: isProduction && !error.isOperational ? 'Internal Server Error' : error.message
    },
    timestamp: new Date().toISOString(),
    requestId
  };

  if (error.details !== undefined && (!isProduction || error.isOperational)) {
    body.error.details = error.details;
  }
  if (env.NODE_ENV === 'development' && !error.isOperational && error.stack) {
    body.error.stack = error.stack.split('\n');
  }
  return body;
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const error = toApiError(err);

  const context = {
    code: error.code,
    message: error.message,
    statusCode: error.statusCode,
    method: req.method,
    path: req.path,
    requestId: req.id
  };
  if (error.isOperational) {
    logger.warn('Operational error occurred', context);
  } else {
    logger.error('Unexpected error occurred', {
      ...context,
      stack: err instanceof Error ? err.stack : undefined
    });
  }

  res.status(error.statusCode).json(formatErrorResponse(error, req.id));
};

export const notFoundHandler = (req: Request, res: Response): void => {
  const error = new ApiError(404, `Cannot ${req.method} ${req.path}`, undefined, 'NOT_FOUND');
  res.status(404).json(formatErrorResponse(error, req.id));
};

export const handleUncaughtException = (): void => {
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception:', { message: error.message, stack: error.stack });
    setTimeout(() => {
      process.exit(1);
    }, 1000);
  });
};

export const handleUnhandledRejection = (): void => {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection:', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined
    });
  });
};
