import type { ConnectionInfo } from '../types/Connection.js';
import type { SessionHandler } from './SessionHandler.js';

export type ConnectionEvent =
  | { type: 'added'; connection: ConnectionInfo }
  | { type: 'updated'; connection: ConnectionInfo }
  | { type: 'removed'; connectionId: string };

type ConnectionListener = (event: ConnectionEvent) => void;

/** Ends the transport behind a connection. */
export type Disconnector = () => void;

interface Entry {
  handler: SessionHandler;
  disconnect: Disconnector;
}

export class ConnectionRegistry {
  private connections: Map<string, Entry> = new Map();
  private listeners: Set<ConnectionListener> = new Set();

  register(handler: SessionHandler, disconnect: Disconnector): void {
    if (this.connections.has(handler.id)) {
      throw new Error(`Connection already registered: ${handler.id}`);
    }
    this.connections.set(handler.id, { handler, disconnect });
    this.notifyListeners({ type: 'added', connection: handler.info() });
  }

  /** Publishes the handler's current snapshot; ignored once it is unregistered. */
  update(handler: SessionHandler): void {
    if (!this.connections.has(handler.id)) return;
    this.notifyListeners({ type: 'updated', connection: handler.info() });
  }

  unregister(connectionId: string): boolean {
    if (!this.connections.delete(connectionId)) return false;
    this.notifyListeners({ type: 'removed', connectionId });
    return true;
  }

  get(connectionId: string): ConnectionInfo | undefined {
    return this.connections.get(connectionId)?.handler.info();
  }

  list(): ConnectionInfo[] {
    return Array.from(this.connections.values()).map((entry) => entry.handler.info());
  }

  size(): number {
    return this.connections.size;
  }

  disconnect(connectionId: string): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry) return false;

    entry.handler.close();
    entry.disconnect();
    this.unregister(connectionId);
    return true;
  }

  closeAll(): void {
    for (const connectionId of Array.from(this.connections.keys())) {
      this.disconnect(connectionId);
    }
  }

  onChange(listener: ConnectionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notifyListeners(event: ConnectionEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

export const connectionRegistry = new ConnectionRegistry();
