import { Request } from 'express';
import type { AuthenticatedUser } from '../types';
import { parseUnits } from './fixed-point';

export class UnauthorizedError extends Error {
  readonly status = 401;

  constructor(message = 'Authentication required') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

const bodyOf = (req: Request): Record<string, unknown> =>
  typeof req.body === 'object' && req.body !== null ? req.body : {};

export function requireUser(req: Request): AuthenticatedUser {
  if (!req.currentUser) throw new UnauthorizedError();
  return req.currentUser;
}

/** Decimal body field as an 18-decimal fixed-point value. */
export function amountField(req: Request, name: string): bigint {
  return parseUnits(String(bodyOf(req)[name] ?? ''));
}

export function stringField(req: Request, name: string): string {
  const value = bodyOf(req)[name];
  return typeof value === 'string' ? value.trim() : '';
}

export function optionalStringField(req: Request, name: string): string | undefined {
  const value = bodyOf(req)[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function booleanField(req: Request, name: string): boolean {
  return bodyOf(req)[name] === true;
}
