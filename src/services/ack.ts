import type { Ack } from '../types/Connection.js';
import type { Logger } from '../utils/logger.js';
import type { Result } from '../utils/result.js';

/**
 * Maps a fallible outcome onto the success/failure reply a channel request expects.
 * The error stops here: it is logged and becomes a failure reply.
 */
export function toAck<E extends Error>(result: Result<unknown, E>, logger?: Logger, request?: string): Ack {
  if (result.ok) return 'success';

  logger?.warn({ err: result.error, request }, 'Channel request failed');
  return 'failure';
}
