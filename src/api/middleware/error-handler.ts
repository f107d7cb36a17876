import { Request, Response, NextFunction } from 'express';
import logger from '@/utils/logger';
import {
  AuthError,
  ConfigError,
  EtlError,
  SyncInProgressError,
  ValidationError,
  getErrorDetails
} from '@/utils/error-handler';

export function statusCodeFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof SyncInProgressError) return 409;
  // The upstream credential is broken, not the caller's
  if (error instanceof AuthError) return 502;
  return 500;
}

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  next: NextFunction
) => {
  const details = getErrorDetails(error);
  const statusCode = statusCodeFor(error);

  logger.error('API Error occurred', {
    error: details.message,
    errorName: details.name,
    stack: details.stack,
    path: req.path,
    method: req.method,
    ip: req.ip,
    statusCode
  });

  // Pipeline errors are safe to show; anything else is an internal detail
  const exposed = error instanceof EtlError && !(error instanceof ConfigError);

  res.status(statusCode).json({
    error: exposed ? details.name : 'InternalError',
    message: exposed ? details.message : 'Internal server error',
    ...(error instanceof EtlError && exposed ? { context: error.context } : {}),
    ...(process.env.NODE_ENV === 'development' && { stack: details.stack })
  });
};

// Async error wrapper
export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
