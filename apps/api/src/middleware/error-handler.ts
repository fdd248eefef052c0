import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { MalformedPayloadError, TelemetryError } from '@ride-telemetry/domain';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof MalformedPayloadError) {
    res.status(err.status).json({ reply: err.message, error: 'validation_error', details: err.issues });
    return;
  }
  if (err instanceof TelemetryError) {
    if (err.status >= 500) console.error(`[error-handler] ${err.message}`, err.cause);
    res.status(err.status).json({ reply: err.message, error: err.message });
    return;
  }
  if (err instanceof SyntaxError && 'body' in err) {
    // express.json() rejects unparsable bodies with a SyntaxError
    res.status(400).json({ reply: 'malformed payload', error: 'validation_error' });
    return;
  }
  console.error('[error-handler] unhandled error', err);
  res.status(500).json({ error: 'Internal server error' });
}
