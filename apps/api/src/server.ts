import { createServer } from 'http';
import type { Server } from 'http';
import {
  InMemorySessionStore,
  PgSessionStore,
  applySchema,
  closePool,
  getPool,
} from '@ride-telemetry/adapters';
import type { SessionStorePort } from '@ride-telemetry/domain';
import { buildApp } from './app.js';
import type { BuildAppOptions } from './app.js';
import { loadConfig } from './config/env.js';
import type { AppConfig } from './config/env.js';
import { buildServices } from './services/container.js';
import { WsGateway } from './ws/ws-gateway.js';

export interface RunningServer {
  httpServer: Server;
  /** Port actually bound; differs from the configured one when that was 0. */
  port: number;
  close(): Promise<void>;
}

async function openStore(databaseUrl: string | null): Promise<SessionStorePort> {
  if (!databaseUrl) {
    console.warn('[server] DATABASE_URL not set; session state is kept in memory');
    return new InMemorySessionStore();
  }
  await getPool().query('SELECT 1');
  console.log('[server] database connected');
  await applySchema();
  return new PgSessionStore();
}

export async function startServer(
  config: AppConfig,
  opts: BuildAppOptions = {},
): Promise<RunningServer> {
  const store = await openStore(config.databaseUrl);

  const httpServer = createServer();
  const wsGateway = new WsGateway(httpServer);
  const services = buildServices(config, store, { publisher: wsGateway });
  httpServer.on('request', buildApp(services, config, opts));

  await new Promise<void>((resolve) => httpServer.listen(config.port, resolve));
  const address = httpServer.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.port;
  console.log(`[server] listening on http://0.0.0.0:${port}`);

  return {
    httpServer,
    port,
    async close() {
      await wsGateway.close();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      await closePool();
    },
  };
}

async function main() {
  const config = loadConfig();
  if (!config.ingestApiKey) {
    console.warn('[server] INGEST_API_KEY not set; every ingest request will be refused');
  }

  const server = await startServer(config);

  const shutdown = async () => {
    console.log('[server] shutting down...');
    await server.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

if (require.main === module) {
  main().catch((err) => {
    console.error('[server] fatal startup error', err);
    process.exit(1);
  });
}
