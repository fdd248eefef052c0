import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { TelemetryIngestionPort } from '@ride-telemetry/domain';
import { requireApiKey } from '../middleware/api-key.js';

export function createIngestRouter(
  ingestion: TelemetryIngestionPort,
  apiKey: string | null,
): Router {
  const router = Router();

  /** POST /update: device webhook: powered_on | start_session | end_session | new_data */
  router.post(
    '/update',
    requireApiKey(apiKey),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const outcome = await ingestion.submit(req.body);
        res.status(outcome.status === 'rejected' ? 501 : 200).json({ reply: outcome.reply });
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
