/**
 * Request parsing and the shared error envelope for API routes
 */

import type { Request, Response } from 'express';
import { PublicKey, UInt64 } from 'o1js';
import { ERROR_CATEGORY, MAX_UINT64, isWagerError, type ErrorCategory } from '@pooled-wager/contracts';

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  [ERROR_CATEGORY.AUTHORIZATION]: 403,
  [ERROR_CATEGORY.STATE]: 409,
  [ERROR_CATEGORY.VALIDATION]: 400,
  [ERROR_CATEGORY.CONFLICT]: 409,
  [ERROR_CATEGORY.TRANSFER]: 502,
};

/**
 * Client error raised while reading a request, before the engine is reached
 */
export class RequestError extends Error {
  constructor(
    message: string,
    readonly status = 400
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

export function sendError(res: Response, error: unknown) {
  if (isWagerError(error)) {
    const status = error.code === 'UnknownEvent' ? 404 : STATUS_BY_CATEGORY[error.category];
    return res.status(status).json({
      success: false,
      error: error.message,
      code: error.code,
    });
  }
  if (error instanceof RequestError) {
    return res.status(error.status).json({
      success: false,
      error: error.message,
    });
  }

  console.error('[API] Unexpected error:', error);
  return res.status(500).json({
    success: false,
    error: error instanceof Error ? error.message : 'Internal error',
  });
}

/**
 * JSON body as a plain record; anything else reads as empty
 */
export function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
}

export function parsePublicKey(value: unknown, field: string): PublicKey {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new RequestError(`${field} is required`);
  }
  try {
    return PublicKey.fromBase58(value.trim());
  } catch {
    throw new RequestError(`${field} is not a valid public key`);
  }
}

/**
 * Caller identity from the x-caller header
 */
export function parseCaller(req: Request): PublicKey {
  const header = req.header('x-caller');
  if (!header) {
    throw new RequestError('x-caller header is required', 401);
  }
  return parsePublicKey(header, 'x-caller');
}

/**
 * Amount in nanounits, as a decimal string or a safe integer
 */
export function parseAmount(value: unknown, field = 'amount'): UInt64 {
  const text = typeof value === 'number' && Number.isSafeInteger(value) ? String(value) : value;
  if (typeof text !== 'string' || !/^\d+$/.test(text)) {
    throw new RequestError(`${field} must be a non-negative integer`);
  }
  if (BigInt(text) > MAX_UINT64) {
    throw new RequestError(`${field} is too large`);
  }
  return UInt64.from(text);
}

export function parseEventId(value: string): number {
  const eventId = parseInt(value);
  if (isNaN(eventId) || eventId < 1 || String(eventId) !== value) {
    throw new RequestError('Invalid event ID');
  }
  return eventId;
}
