import { WebSocket } from 'ws';
import { describe, it, expect, vi } from 'vitest';
import { ConnectionRegistry } from '../services/ConnectionRegistry.js';
import { SessionHandler } from '../services/SessionHandler.js';
import type { ServerMessage } from '../types/Protocol.js';
import { HelloApp } from '../ui/HelloApp.js';
import { MessageHandler } from './MessageHandler.js';

function fakeSocket() {
  const sent: ServerMessage[] = [];
  const ws = {
    readyState: WebSocket.OPEN,
    send: (data: string) => sent.push(JSON.parse(data)),
  } as unknown as WebSocket;
  return { ws, sent };
}

function handler(id: string) {
  return new SessionHandler(id, { appFactory: () => new HelloApp() });
}

describe('MessageHandler', () => {
  it('sends the connection list on connect', () => {
    const registry = new ConnectionRegistry();
    registry.register(handler('a'), () => {});
    const messages = new MessageHandler(registry);
    const { ws, sent } = fakeSocket();

    messages.handleConnection(ws);

    expect(sent).toHaveLength(1);
    expect(sent[0].type).toBe('connections');
  });

  it('broadcasts registry changes while started', () => {
    const registry = new ConnectionRegistry();
    const messages = new MessageHandler(registry);
    const { ws, sent } = fakeSocket();
    messages.handleConnection(ws);
    messages.start();

    registry.register(handler('a'), () => {});
    registry.unregister('a');
    messages.stop();
    registry.register(handler('b'), () => {});

    expect(sent.map((m) => m.type)).toEqual(['connections', 'connection-added', 'connection-removed']);
  });

  it('disconnects on request', () => {
    const registry = new ConnectionRegistry();
    const end = vi.fn();
    registry.register(handler('a'), end);
    const messages = new MessageHandler(registry);
    const { ws, sent } = fakeSocket();

    messages.handleMessage(ws, { type: 'disconnect', connectionId: 'a' });

    expect(end).toHaveBeenCalledTimes(1);
    expect(sent).toEqual([]);
  });

  it('reports an unknown connection', () => {
    const messages = new MessageHandler(new ConnectionRegistry());
    const { ws, sent } = fakeSocket();

    messages.handleMessage(ws, { type: 'disconnect', connectionId: 'missing' });

    expect(sent).toEqual([
      { type: 'error', message: 'Connection not found: missing', code: 'CONNECTION_NOT_FOUND' },
    ]);
  });

  it('skips sockets that are not open', () => {
    const messages = new MessageHandler(new ConnectionRegistry());
    const send = vi.fn();
    const ws = { readyState: WebSocket.CLOSED, send } as unknown as WebSocket;

    messages.handleConnection(ws);

    expect(send).not.toHaveBeenCalled();
  });
});
