import { describe, it, expect } from 'vitest';
import { createEventQueue } from './EventQueue.js';

describe('createEventQueue', () => {
  it('delivers items in enqueue order', async () => {
    const { sender, receiver } = createEventQueue<number>();
    sender.send(1);
    sender.send(2);
    sender.send(3);

    expect(await receiver.recv()).toBe(1);
    expect(await receiver.recv()).toBe(2);
    expect(await receiver.recv()).toBe(3);
  });

  it('resolves a waiting receiver when an item arrives', async () => {
    const { sender, receiver } = createEventQueue<string>();
    const pending = receiver.recv();
    sender.send('render');

    await expect(pending).resolves.toBe('render');
  });

  it('serializes items from several producers in arrival order', async () => {
    const { sender, receiver } = createEventQueue<string>();
    const fromPty = (item: string) => sender.send(`pty:${item}`);
    const fromTicker = (item: string) => sender.send(`tick:${item}`);

    fromPty('resize');
    fromTicker('render');
    fromPty('render');
    sender.close();

    const received: string[] = [];
    for await (const item of receiver) {
      received.push(item);
    }
    expect(received).toEqual(['pty:resize', 'tick:render', 'pty:render']);
  });

  it('drains pending items before reporting end-of-stream', async () => {
    const { sender, receiver } = createEventQueue<number>();
    sender.send(7);
    sender.close();

    expect(await receiver.recv()).toBe(7);
    expect(await receiver.recv()).toBeUndefined();
    expect(await receiver.recv()).toBeUndefined();
  });

  it('ends a waiting receiver when the sender closes', async () => {
    const { sender, receiver } = createEventQueue<number>();
    const pending = receiver.recv();
    sender.close();

    await expect(pending).resolves.toBeUndefined();
  });

  it('refuses items after close', () => {
    const { sender, receiver } = createEventQueue<number>();
    sender.close();

    expect(sender.send(1)).toBe(false);
    expect(sender.closed).toBe(true);
    expect(receiver.pending).toBe(0);
  });

  it('allows only one pending receive at a time', async () => {
    const { sender, receiver } = createEventQueue<number>();
    const first = receiver.recv();

    await expect(receiver.recv()).rejects.toThrow('EventQueue already has a pending receiver');

    sender.send(5);
    await expect(first).resolves.toBe(5);
  });
});
