import type { OutputSink } from '../app/OutputSink.js';
import type { RenderLoopExit } from '../app/RenderLoop.js';
import { ChannelBridgeError, ProtocolViolationError } from '../errors.js';
import type { Ack, AuthMethod, ConnectionInfo, RemoteInfo, SessionState } from '../types/Connection.js';
import type { TerminalAppFactory } from '../ui/TerminalApp.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';
import { toAck } from './ack.js';
import { ChannelBridge } from './ChannelBridge.js';

export interface SessionHandlerOptions {
  appFactory: TerminalAppFactory;
  tickInterval?: number;
  remote?: RemoteInfo;
  logger?: Logger;
  /** Fired after every state or channel change. */
  onChange?: (handler: SessionHandler) => void;
  /** Fired when a channel's render loop has stopped. */
  onChannelExit?: (channelId: number, outcome: RenderLoopExit | Error) => void;
}

/**
 * Protocol-facing state machine for one SSH connection.
 *
 * Owns at most one channel bridge. Request outcomes come back as acks;
 * only a second channel open throws, and that ends the connection.
 */
export class SessionHandler {
  readonly id: string;
  private readonly options: SessionHandlerOptions;
  private readonly log: Logger;
  private state: SessionState = 'unauthenticated';
  private username: string | null = null;
  private bridge: ChannelBridge | null = null;
  private readonly connectedAt = new Date();
  private lastActivityAt = new Date();

  constructor(id: string, options: SessionHandlerOptions) {
    this.id = id;
    this.options = options;
    this.log = (options.logger ?? rootLogger).child({ connectionId: id });
  }

  get currentState(): SessionState {
    return this.state;
  }

  get channel(): ChannelBridge | null {
    return this.bridge;
  }

  /** Every method is accepted; there is no trust policy yet. */
  authenticate(method: AuthMethod, username: string): 'accept' {
    this.touch();
    this.username = username;
    if (this.state === 'unauthenticated') {
      this.transition('authenticated');
    }
    this.log.info({ method, username }, 'Client authenticated');
    return 'accept';
  }

  openChannel(channelId: number): true {
    this.touch();
    if (this.state === 'unauthenticated' || this.state === 'closed') {
      throw new ProtocolViolationError(`Channel open not allowed in state ${this.state}`);
    }
    if (this.bridge) {
      throw new ProtocolViolationError('Only a single session channel can be opened per connection');
    }

    this.bridge = new ChannelBridge(channelId, {
      appFactory: this.options.appFactory,
      tickInterval: this.options.tickInterval,
      logger: this.log,
      onExit: (outcome) => {
        this.options.onChannelExit?.(channelId, outcome);
        this.changed();
      },
    });
    this.transition('channel-requested');
    return true;
  }

  forwardInput(channelId: number, data: Buffer): Ack {
    this.touch();
    return toAck(this.withChannel(channelId, (bridge) => bridge.stdin(data)), this.log, 'data');
  }

  requestPty(channelId: number, output: OutputSink, cols: number, rows: number): Ack {
    this.touch();
    const ack = toAck(
      this.withChannel(channelId, (bridge) => bridge.createPty(output, cols, rows)),
      this.log,
      'pty-req',
    );
    if (ack === 'success') {
      this.transition('pty-ready');
    }
    return ack;
  }

  requestResize(channelId: number, cols: number, rows: number): Ack {
    this.touch();
    const ack = toAck(
      this.withChannel(channelId, (bridge) => bridge.resize(cols, rows)),
      this.log,
      'window-change',
    );
    if (ack === 'success') {
      this.changed();
    }
    return ack;
  }

  /** The shell request opens the data stream; it needs an open channel, not a PTY. */
  requestShell(channelId: number): Ack {
    this.touch();
    const result = this.withChannel(channelId, (bridge) =>
      bridge.closed ? err(new ChannelBridgeError('CHANNEL_CLOSED', `Channel ${channelId} is closed`)) : ok(undefined),
    );
    return toAck(result, this.log, 'shell');
  }

  closeChannel(channelId: number): void {
    const bridge = this.bridge;
    if (!bridge || bridge.channelId !== channelId) return;
    bridge.close();
    this.changed();
  }

  /** Connection ended: the channel's producer is dropped and the handler is done. */
  close(): void {
    if (this.state === 'closed') return;
    this.bridge?.close();
    this.transition('closed');
    this.log.info('Connection closed');
  }

  info(): ConnectionInfo {
    return {
      id: this.id,
      state: this.state,
      username: this.username,
      remote: this.options.remote ?? null,
      channel: this.bridge ? this.bridge.info() : null,
      connectedAt: this.connectedAt.toISOString(),
      lastActivityAt: this.lastActivityAt.toISOString(),
    };
  }

  private withChannel(
    channelId: number,
    action: (bridge: ChannelBridge) => Result<void, ChannelBridgeError>,
  ): Result<void, ChannelBridgeError> {
    if (!this.bridge) {
      return err(new ChannelBridgeError('NO_CHANNEL', 'Expected a session channel to be open'));
    }
    if (this.bridge.channelId !== channelId) {
      return err(
        new ChannelBridgeError('CHANNEL_MISMATCH', `Unknown channel ${channelId}, open channel is ${this.bridge.channelId}`),
      );
    }
    return action(this.bridge);
  }

  private transition(next: SessionState): void {
    if (this.state === next) return;
    this.log.debug({ from: this.state, to: next }, 'Session state changed');
    this.state = next;
    this.changed();
  }

  private changed(): void {
    this.options.onChange?.(this);
  }

  private touch(): void {
    this.lastActivityAt = new Date();
  }
}
