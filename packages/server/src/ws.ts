// ============================================================================
// Uplink — WebSocket handling
// ============================================================================
import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { ClientMessage, ServerMessage } from '@uplink/shared';
import { describeError } from './errors.js';

export interface WsHandlers {
  onCredentialResponse(id: string, secret: string | null): void;
  onConnect(): void;
  /** Messages sent to a client as soon as it connects. */
  greeting(): ServerMessage[];
}

export function parseClientMessage(raw: string): ClientMessage | null {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof msg !== 'object' || msg === null || !('type' in msg)) return null;

  if (msg.type === 'connect') return { type: 'connect' };
  if (msg.type === 'credential_response' && 'id' in msg && typeof msg.id === 'string') {
    const secret = 'secret' in msg && typeof msg.secret === 'string' ? msg.secret : null;
    return { type: 'credential_response', id: msg.id, secret };
  }
  return null;
}

export class UplinkSocketServer {
  private wss: WebSocketServer;

  constructor(server: Server, private handlers: WsHandlers) {
    this.wss = new WebSocketServer({ server, path: '/ws' });
    this.wss.on('connection', (ws: WebSocket) => this.onConnection(ws));
  }

  /** Sends to every open client and returns how many there were. */
  broadcast(message: ServerMessage): number {
    const data = JSON.stringify(message);
    let sent = 0;
    this.wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
        sent++;
      }
    });
    return sent;
  }

  close(): Promise<void> {
    for (const client of this.wss.clients) client.terminate();
    return new Promise((resolve, reject) => this.wss.close(err => (err ? reject(err) : resolve())));
  }

  private send(ws: WebSocket, message: ServerMessage) {
    ws.send(JSON.stringify(message));
  }

  private onConnection(ws: WebSocket) {
    console.log('⚡ Client connected');
    for (const message of this.handlers.greeting()) this.send(ws, message);

    ws.on('message', (data) => {
      const msg = parseClientMessage(data.toString());
      if (!msg) {
        this.send(ws, { type: 'error', message: 'Unrecognised message' });
        return;
      }
      try {
        if (msg.type === 'connect') this.handlers.onConnect();
        else this.handlers.onCredentialResponse(msg.id, msg.secret);
      } catch (err) {
        console.error(`⚡ Failed to handle ${msg.type}: ${describeError(err)}`);
      }
    });

    ws.on('close', () => {
      console.log('⚡ Client disconnected');
    });
  }
}
