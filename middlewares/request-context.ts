import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
    }
  }
}

/**
 * Tags every request with an id (echoed in X-Request-ID) that error responses carry.
 */
export const requestContext = (req: Request, res: Response, next: NextFunction) => {
  req.requestId = randomUUID();
  req.startTime = Date.now();
  res.setHeader('X-Request-ID', req.requestId);
  next();
};
