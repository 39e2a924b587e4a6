import { WebSocket } from 'ws';
import type { ConnectionEvent, ConnectionRegistry } from '../services/ConnectionRegistry.js';
import type { ClientMessage, ServerMessage } from '../types/Protocol.js';
import { assertNever } from '../utils/exhaustive.js';

/** Pushes connection changes to admin WebSocket clients and serves their requests. */
export class MessageHandler {
  private clients: Set<WebSocket> = new Set();
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly registry: ConnectionRegistry) {}

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.registry.onChange((event) => {
      this.broadcastToAll(this.toMessage(event));
    });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.clients.clear();
  }

  handleConnection(ws: WebSocket): void {
    this.clients.add(ws);
    this.send(ws, { type: 'connections', connections: this.registry.list() });
  }

  handleDisconnection(ws: WebSocket): void {
    this.clients.delete(ws);
  }

  handleMessage(ws: WebSocket, message: ClientMessage): void {
    switch (message.type) {
      case 'list-connections':
        this.send(ws, { type: 'connections', connections: this.registry.list() });
        break;

      case 'disconnect':
        if (!this.registry.disconnect(message.connectionId)) {
          this.send(ws, {
            type: 'error',
            message: `Connection not found: ${message.connectionId}`,
            code: 'CONNECTION_NOT_FOUND',
          });
        }
        break;

      default:
        assertNever(message, 'Unknown message type');
    }
  }

  broadcastToAll(message: ServerMessage): void {
    for (const ws of this.clients) {
      this.send(ws, message);
    }
  }

  private toMessage(event: ConnectionEvent): ServerMessage {
    switch (event.type) {
      case 'added':
        return { type: 'connection-added', connection: event.connection };
      case 'updated':
        return { type: 'connection-updated', connection: event.connection };
      case 'removed':
        return { type: 'connection-removed', connectionId: event.connectionId };
      default:
        return assertNever(event);
    }
  }

  private send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }
}
