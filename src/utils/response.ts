import { Request, Response } from 'express';

export const StatusCodes = {
  OK: 200,
  CREATED: 201,
  ACCEPTED: 202,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

export interface SuccessBody<T> {
  success: true;
  data: T;
  message?: string;
  timestamp: string;
  requestId?: string;
}

export const successResponse = <T>(
  req: Request,
  res: Response,
  data: T,
  statusCode: number = StatusCodes.OK,
  message?: string
): Response => {
  const body: SuccessBody<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
    requestId: req.id
  };
  if (message) {
    body.message = message;
  }
  return res.status(statusCode).json(body);
};

export const responseUtils = {
  ok: <T>(req: Request, res: Response, data: T, message?: string) =>
    successResponse(req, res, data, StatusCodes.OK, message),
  accepted: <T>(req: Request, res: Response, data: T, message?: string) =>
    successResponse(req, res, data, StatusCodes.ACCEPTED, message)
};
