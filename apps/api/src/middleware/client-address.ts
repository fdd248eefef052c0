import type { Request } from 'express';

/** First X-Forwarded-For hop when behind a proxy, else the socket peer. */
export function clientAddress(req: Request): string {
  const forwarded = req.header('x-forwarded-for');
  const first = forwarded?.split(',')[0]?.trim();
  if (first) return first;
  return req.socket.remoteAddress ?? '';
}
