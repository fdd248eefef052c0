import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

function presentedKey(req: Request): string | null {
  const header = req.header('x-api-key')?.trim();
  if (header) return header;
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'apikey' in body) {
    const key = body.apikey;
    if (typeof key === 'string' && key.length > 0) return key;
  }
  return null;
}

function sameKey(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Shared-secret gate in front of ingest. The key comes from the device-cloud
 * envelope (`apikey`) or the `x-api-key` header. With no key configured every
 * request is refused.
 */
export function requireApiKey(expectedKey: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const key = presentedKey(req);
    if (expectedKey !== null && key !== null && sameKey(key, expectedKey)) {
      return next();
    }
    console.warn('[api-key] invalid api key match');
    return res.status(401).json({ reply: 'invalid key' });
  };
}
