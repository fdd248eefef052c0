import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type {
  SessionStateMessage,
  SessionStreamPublisherPort,
  TelemetryPoint,
} from '@ride-telemetry/domain';

type WsMessage =
  | { type: 'sample'; data: TelemetryPoint }
  | { type: 'sessionState'; data: SessionStateMessage };

/** Pushes accepted samples and session transitions to dashboard sockets on /ws. */
export class WsGateway implements SessionStreamPublisherPort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();

  constructor(server: Server) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    console.log('[ws-gateway] listening on /ws');
  }

  get clientCount(): number {
    return this.clients.size;
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  async publishSample(point: TelemetryPoint): Promise<void> {
    this.broadcast({ type: 'sample', data: point });
  }

  async publishSessionState(state: SessionStateMessage): Promise<void> {
    this.broadcast({ type: 'sessionState', data: state });
  }

  close(): Promise<void> {
    for (const client of this.clients) client.terminate();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
