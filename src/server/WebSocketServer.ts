import { WebSocket, WebSocketServer as WSServer } from 'ws';
import type { IncomingMessage, Server } from 'http';
import { extractTokenFromUrl } from '../middleware/auth.js';
import type { AuthService } from '../services/AuthService.js';
import { isClientMessage } from '../types/Protocol.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { MessageHandler } from './MessageHandler.js';

const HEARTBEAT_INTERVAL_MS = 30000;

export class WebSocketServerManager {
  private wss: WSServer | null = null;
  private pingInterval: NodeJS.Timeout | null = null;
  private alive: WeakMap<WebSocket, boolean> = new WeakMap();
  private readonly log: Logger;

  constructor(
    private readonly messageHandler: MessageHandler,
    private readonly authService: AuthService,
    logger: Logger = rootLogger,
  ) {
    this.log = logger.child({ component: 'ws' });
  }

  initialize(server: Server, path = '/ws'): void {
    this.wss = new WSServer({ server, path });
    this.messageHandler.start();

    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      if (!this.authorize(req)) {
        ws.close(4401, 'Unauthorized');
        return;
      }

      this.alive.set(ws, true);
      this.log.debug('Admin client connected');
      this.messageHandler.handleConnection(ws);

      ws.on('pong', () => {
        this.alive.set(ws, true);
      });

      ws.on('message', (data) => {
        let message: unknown;
        try {
          message = JSON.parse(data.toString());
        } catch (err) {
          this.log.warn({ err }, 'Failed to parse message');
          ws.send(JSON.stringify({ type: 'error', message: 'Invalid message format' }));
          return;
        }

        if (!isClientMessage(message)) {
          ws.send(JSON.stringify({ type: 'error', message: 'Unknown message type' }));
          return;
        }
        this.messageHandler.handleMessage(ws, message);
      });

      ws.on('close', () => {
        this.log.debug('Admin client disconnected');
        this.messageHandler.handleDisconnection(ws);
      });

      ws.on('error', (err) => {
        this.log.warn({ err }, 'WebSocket error');
      });
    });

    // Heartbeat to detect dead connections
    this.pingInterval = setInterval(() => {
      this.wss?.clients.forEach((ws) => {
        if (!this.alive.get(ws)) {
          ws.terminate();
          return;
        }
        this.alive.set(ws, false);
        ws.ping();
      });
    }, HEARTBEAT_INTERVAL_MS);
    this.pingInterval.unref();

    this.wss.on('close', () => {
      if (this.pingInterval) {
        clearInterval(this.pingInterval);
        this.pingInterval = null;
      }
    });
  }

  close(): void {
    this.messageHandler.stop();
    for (const ws of this.wss?.clients ?? []) {
      ws.terminate();
    }
    this.wss?.close();
    this.wss = null;
  }

  private authorize(req: IncomingMessage): boolean {
    if (!this.authService.isEnabled()) return true;

    const token = extractTokenFromUrl(req.url ?? '');
    if (!token) return false;
    try {
      this.authService.verifyToken(token);
      return true;
    } catch {
      return false;
    }
  }
}
