import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG, mergeConfig } from '../config/index.js';
import { createApp } from '../server/app.js';
import { ConnectionRegistry } from '../services/ConnectionRegistry.js';
import { SessionHandler } from '../services/SessionHandler.js';
import { HelloApp } from '../ui/HelloApp.js';

const config = mergeConfig(DEFAULT_CONFIG, { logging: { level: 'silent' } });

describe('connection routes', () => {
  let app: FastifyInstance;
  let registry: ConnectionRegistry;
  let handler: SessionHandler;
  const end = vi.fn();

  beforeEach(async () => {
    end.mockClear();
    registry = new ConnectionRegistry();
    handler = new SessionHandler('conn-1', { appFactory: () => new HelloApp() });
    handler.authenticate('none', 'alice');
    registry.register(handler, end);
    app = await createApp({ config, registry });
  });

  afterEach(async () => {
    await app.close();
  });

  it('lists connections', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/connections' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.connections).toHaveLength(1);
    expect(body.connections[0]).toMatchObject({ id: 'conn-1', state: 'authenticated', username: 'alice', channel: null });
  });

  it('filters by state', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/connections?state=pty-ready' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ connections: [] });
  });

  it('rejects an unknown state filter', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/connections?state=sleeping' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'Unknown state: sleeping' });
  });

  it('returns a single connection', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/connections/conn-1' });

    expect(res.statusCode).toBe(200);
    expect(res.json().connection.id).toBe('conn-1');
  });

  it('returns 404 for an unknown connection', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/connections/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Connection not found' });
  });

  it('disconnects a connection', async () => {
    const res = await app.inject({ method: 'DELETE', url: '/api/connections/conn-1' });

    expect(res.statusCode).toBe(204);
    expect(end).toHaveBeenCalledTimes(1);
    expect(handler.currentState).toBe('closed');
    expect(registry.size()).toBe(0);
  });

  it('returns 404 when disconnecting an unknown connection', async () => {
    const res = await app.inject({ method: 'DELETE', url: '/api/connections/nope' });

    expect(res.statusCode).toBe(404);
    expect(end).not.toHaveBeenCalled();
  });

  it('reports health with the connection count', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.json()).toEqual({ status: 'ok', connections: 1 });
  });
});
