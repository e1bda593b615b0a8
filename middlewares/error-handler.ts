import { Request, Response, NextFunction } from 'express';
import { isDuplicateKeyError, isLedgerError, toUserMessage } from '../utils/ledger-error';
import { logger } from '../utils/logger';

export interface StandardErrorResponse {
  success: false;
  message: string;
  code: string;
  requestId?: string;
}

export interface ErrorClassification {
  statusCode: number;
  code: string;
  message: string;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return undefined;
}

const STATUS_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  413: 'PAYLOAD_TOO_LARGE',
  429: 'RATE_LIMIT_EXCEEDED',
};

export function classifyError(err: unknown): ErrorClassification {
  if (isLedgerError(err)) {
    return { statusCode: err.status, code: err.code, message: err.message };
  }

  if (err instanceof Error && (err.name === 'ValidationError' || err.name === 'CastError')) {
    return { statusCode: 400, code: 'VALIDATION_ERROR', message: toUserMessage(err) };
  }

  if (isDuplicateKeyError(err)) {
    return { statusCode: 409, code: 'DUPLICATE_ENTRY', message: 'This resource already exists.' };
  }

  // body-parser and friends attach an HTTP status
  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    return { statusCode: status, code: STATUS_CODES[status] ?? 'CLIENT_ERROR', message: toUserMessage(err) };
  }

  return { statusCode: 500, code: 'INTERNAL_SERVER_ERROR', message: toUserMessage(err) };
}

/**
 * Centralized error handling middleware.
 * Must be added last in the middleware chain.
 */
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const classification = classifyError(err);

  const errorResponse: StandardErrorResponse = {
    success: false,
    message: classification.message,
    code: classification.code,
    requestId: req.requestId,
  };

  if (classification.statusCode < 500) {
    logger.warn(`Client error on ${req.method} ${req.originalUrl}: ${classification.code} ${classification.message}`);
  } else {
    logger.error(`Server error on ${req.method} ${req.originalUrl}`, err);
  }

  res.status(classification.statusCode).json(errorResponse);
};

/**
 * 404 handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  const errorResponse: StandardErrorResponse = {
    success: false,
    message: 'Route not found.',
    code: 'NOT_FOUND',
    requestId: req.requestId,
  };
  logger.warn(`404 Not Found: ${req.method} ${req.originalUrl}`);
  res.status(404).json(errorResponse);
};
