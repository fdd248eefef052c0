import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ControlAuthorization, SessionQueryPort } from '@ride-telemetry/domain';
import { clientAddress } from '../middleware/client-address.js';
import type { SessionTracker } from '../services/session/session-tracker.js';

export interface SessionRouterOptions {
  devMode: boolean;
}

export function createSessionRouter(
  query: SessionQueryPort,
  tracker: SessionTracker,
  opts: SessionRouterOptions,
): Router {
  const router = Router();

  /** GET /api/session/summary: waiting | live | final */
  router.get('/summary', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await query.summary());
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/session/series: chart data, oldest first */
  router.get('/series', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await query.series());
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/session/latest */
  router.get('/latest', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await query.latest() });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/session/state: lifecycle markers and phase */
  router.get('/state', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const [markers, phase, durationSeconds] = await Promise.all([
        tracker.markers(),
        tracker.phase(),
        tracker.durationSoFar(),
      ]);
      res.json({ phase, durationSeconds, ...markers });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/session/control-authorization: whether this caller may drive the
   * bike's resistance. Matches the address captured at session start; dev mode
   * authorizes everyone.
   */
  router.get('/control-authorization', async (req: Request, res: Response, next: NextFunction) => {
    try {
      let body: ControlAuthorization = { authorized: false, reason: null };
      if (await query.isAuthorizedOrigin(clientAddress(req))) {
        body = { authorized: true, reason: 'ip_match' };
      } else if (opts.devMode) {
        body = { authorized: true, reason: 'dev_mode' };
      }
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
