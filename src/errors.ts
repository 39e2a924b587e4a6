export type ChannelBridgeErrorCode =
  | 'PTY_NOT_READY'
  | 'PTY_ALREADY_CREATED'
  | 'INVALID_DIMENSIONS'
  | 'CHANNEL_CLOSED'
  | 'NO_CHANNEL'
  | 'CHANNEL_MISMATCH';

/** A channel request that cannot be honoured in the current state. Reported to the peer as a failure reply. */
export class ChannelBridgeError extends Error {
  readonly code: ChannelBridgeErrorCode;

  constructor(code: ChannelBridgeErrorCode, message: string) {
    super(message);
    this.name = 'ChannelBridgeError';
    this.code = code;
  }
}

/** Breaks a connection-level invariant; the connection is terminated. */
export class ProtocolViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolViolationError';
  }
}

/** An event the render loop has no handler for; ends the affected channel only. */
export class UnsupportedEventError extends Error {
  readonly event: unknown;

  constructor(event: unknown) {
    super(`Unsupported event: ${JSON.stringify(event)}`);
    this.name = 'UnsupportedEventError';
    this.event = event;
  }
}

export class SinkClosedError extends Error {
  constructor(message = 'Output sink is closed') {
    super(message);
    this.name = 'SinkClosedError';
  }
}
