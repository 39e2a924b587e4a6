import { describe, it, expect, vi } from 'vitest';
import { HelloApp } from '../ui/HelloApp.js';
import { ConnectionRegistry, type ConnectionEvent } from './ConnectionRegistry.js';
import { SessionHandler } from './SessionHandler.js';

function handler(id: string) {
  return new SessionHandler(id, { appFactory: () => new HelloApp() });
}

describe('ConnectionRegistry', () => {
  it('lists registered connections', () => {
    const registry = new ConnectionRegistry();
    registry.register(handler('a'), () => {});
    registry.register(handler('b'), () => {});

    expect(registry.size()).toBe(2);
    expect(registry.list().map((c) => c.id)).toEqual(['a', 'b']);
    expect(registry.get('a')?.state).toBe('unauthenticated');
    expect(registry.get('missing')).toBeUndefined();
  });

  it('rejects a duplicate id', () => {
    const registry = new ConnectionRegistry();
    registry.register(handler('a'), () => {});

    expect(() => registry.register(handler('a'), () => {})).toThrow('Connection already registered: a');
  });

  it('emits added, updated and removed events', () => {
    const registry = new ConnectionRegistry();
    const events: ConnectionEvent['type'][] = [];
    registry.onChange((event) => events.push(event.type));
    const conn = handler('a');

    registry.register(conn, () => {});
    registry.update(conn);
    registry.unregister('a');
    registry.update(conn);

    expect(events).toEqual(['added', 'updated', 'removed']);
  });

  it('stops notifying after unsubscribe', () => {
    const registry = new ConnectionRegistry();
    const listener = vi.fn();
    const unsubscribe = registry.onChange(listener);
    unsubscribe();

    registry.register(handler('a'), () => {});

    expect(listener).not.toHaveBeenCalled();
  });

  it('disconnects through the registered closer', () => {
    const registry = new ConnectionRegistry();
    const end = vi.fn();
    const conn = handler('a');
    registry.register(conn, end);

    expect(registry.disconnect('a')).toBe(true);
    expect(end).toHaveBeenCalledTimes(1);
    expect(conn.currentState).toBe('closed');
    expect(registry.size()).toBe(0);
    expect(registry.disconnect('a')).toBe(false);
  });

  it('closes every connection', () => {
    const registry = new ConnectionRegistry();
    const end = vi.fn();
    registry.register(handler('a'), end);
    registry.register(handler('b'), end);

    registry.closeAll();

    expect(end).toHaveBeenCalledTimes(2);
    expect(registry.size()).toBe(0);
  });
});
