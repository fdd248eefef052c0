import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { AppConfig } from './config/env.js';
import { createIngestRouter } from './controllers/ingest.controller.js';
import { createSessionRouter } from './controllers/session.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import type { Services } from './services/container.js';

export interface BuildAppOptions {
  /** Access logging; off in tests. */
  accessLog?: boolean;
}

export function buildApp(
  services: Services,
  config: Pick<AppConfig, 'ingestApiKey' | 'devMode' | 'corsOrigin'>,
  opts: BuildAppOptions = {},
): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  if (opts.accessLog ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '64kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  const ingestRouter = createIngestRouter(services.ingestion, config.ingestApiKey);
  app.use('/', ingestRouter);
  app.use('/api/ingest', ingestRouter);
  app.use(
    '/api/session',
    createSessionRouter(services.stats, services.tracker, { devMode: config.devMode }),
  );

  app.get('/healthz', async (_req, res, next) => {
    try {
      const storageUp = await services.store.ping();
      res.status(storageUp ? 200 : 503).json({
        status: storageUp ? 'ok' : 'degraded',
        ts: new Date().toISOString(),
        storage: storageUp ? 'connected' : 'unavailable',
      });
    } catch (err) {
      next(err);
    }
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
