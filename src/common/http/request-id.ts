import crypto from 'node:crypto';
import type { Request } from 'express';

const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Caller-supplied request identifier, or null when the header is absent or blank.
 */
export const findRequestId = (
  req: Pick<Request, 'headers'>,
): string | null => {
  const raw = req.headers[REQUEST_ID_HEADER];

  if (typeof raw === 'string' && raw.trim().length > 0) return raw;
  if (
    Array.isArray(raw) &&
    typeof raw[0] === 'string' &&
    raw[0].trim().length > 0
  )
    return raw[0];

  return null;
};

export const getRequestId = (req: Pick<Request, 'headers'>): string =>
  findRequestId(req) ?? crypto.randomUUID();
