import { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';
import logger from '@/utils/logger';

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Bearer token check against the service API key. */
export const createAuthMiddleware = (apiKey: string): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      logger.warn('Missing authorization header', {
        path: req.path,
        ip: req.ip
      });
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Authorization header required'
      });
      return;
    }

    const token = authHeader.startsWith('Bearer ')
      ? authHeader.slice(7)
      : authHeader;

    if (!sameKey(token, apiKey)) {
      logger.warn('Invalid API key', {
        path: req.path,
        ip: req.ip
      });
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Invalid API key'
      });
      return;
    }

    next();
  };
};
