import { describe, it, expect } from 'vitest';
import { isClientMessage } from './Protocol.js';

describe('isClientMessage', () => {
  it('accepts list-connections', () => {
    expect(isClientMessage({ type: 'list-connections' })).toBe(true);
  });

  it('accepts disconnect with a connection id', () => {
    expect(isClientMessage({ type: 'disconnect', connectionId: 'abc' })).toBe(true);
  });

  it('rejects disconnect without a usable id', () => {
    expect(isClientMessage({ type: 'disconnect' })).toBe(false);
    expect(isClientMessage({ type: 'disconnect', connectionId: '' })).toBe(false);
    expect(isClientMessage({ type: 'disconnect', connectionId: 7 })).toBe(false);
  });

  it('rejects unknown message types', () => {
    expect(isClientMessage({ type: 'subscribe' })).toBe(false);
  });

  it('rejects non-object inputs', () => {
    expect(isClientMessage(null)).toBe(false);
    expect(isClientMessage('list-connections')).toBe(false);
    expect(isClientMessage({})).toBe(false);
  });
});
