import { createEventQueue, type EventSender } from '../app/EventQueue.js';
import { inputEvent, renderEvent, resizeEvent, type AppEvent } from '../app/events.js';
import type { OutputSink } from '../app/OutputSink.js';
import { RenderLoop, type RenderLoopExit } from '../app/RenderLoop.js';
import { ChannelBridgeError, SinkClosedError } from '../errors.js';
import type { ChannelBridgeInfo, ChannelState, Dimensions } from '../types/Terminal.js';
import type { TerminalAppFactory } from '../ui/TerminalApp.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';

const MAX_DIMENSION = 0xffff;
// Each frame allocates one cell per column and row
const MAX_CELLS = 0xffff;

export interface ChannelBridgeOptions {
  appFactory: TerminalAppFactory;
  /** Periodic render trigger in ms; 0 disables it. */
  tickInterval?: number;
  logger?: Logger;
  /** Called once the render loop has stopped, with the reason or the error that ended it. */
  onExit?: (outcome: RenderLoopExit | Error) => void;
}

type BridgeResult = Result<void, ChannelBridgeError>;

function validDimension(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= MAX_DIMENSION;
}

function validSize(cols: number, rows: number): boolean {
  return validDimension(cols) && validDimension(rows) && cols * rows <= MAX_CELLS;
}

/**
 * One session channel: its PTY lifecycle, geometry, and the producer end of
 * the queue feeding its render loop.
 */
export class ChannelBridge {
  readonly channelId: number;
  private readonly options: ChannelBridgeOptions;
  private readonly log: Logger;
  private state: ChannelState = 'open';
  private dimensions: Dimensions | null = null;
  private sender: EventSender<AppEvent> | null = null;
  private ticker: NodeJS.Timeout | null = null;
  private exit: Promise<void> = Promise.resolve();

  constructor(channelId: number, options: ChannelBridgeOptions) {
    this.channelId = channelId;
    this.options = options;
    this.log = (options.logger ?? rootLogger).child({ channelId });
  }

  get ptyCreated(): boolean {
    return this.sender !== null;
  }

  get closed(): boolean {
    return this.state === 'closed';
  }

  /** Settles when the render loop has exited; already settled when no loop was started. */
  get done(): Promise<void> {
    return this.exit;
  }

  stdin(data: Buffer): BridgeResult {
    if (this.closed) {
      return err(new ChannelBridgeError('CHANNEL_CLOSED', `Channel ${this.channelId} is closed`));
    }
    if (!this.sender) {
      return err(new ChannelBridgeError('PTY_NOT_READY', 'Input received before a PTY was requested'));
    }

    this.sender.send(inputEvent(Buffer.from(data)));
    return ok(undefined);
  }

  createPty(output: OutputSink, cols: number, rows: number): BridgeResult {
    if (this.closed) {
      return err(new ChannelBridgeError('CHANNEL_CLOSED', `Channel ${this.channelId} is closed`));
    }
    if (this.sender) {
      return err(new ChannelBridgeError('PTY_ALREADY_CREATED', 'A PTY was already created for this channel'));
    }
    if (!validSize(cols, rows)) {
      return err(new ChannelBridgeError('INVALID_DIMENSIONS', `Invalid terminal size ${cols}x${rows}`));
    }

    const { sender, receiver } = createEventQueue<AppEvent>();
    const loop = new RenderLoop({
      app: this.options.appFactory(),
      sink: output,
      events: receiver,
      logger: this.log,
    });

    this.sender = sender;
    this.dimensions = { cols, rows };
    this.state = 'pty-ready';
    this.exit = this.supervise(loop);

    // First frame uses the negotiated size
    sender.send(resizeEvent(cols, rows));
    sender.send(renderEvent());
    this.startTicker();

    this.log.info({ cols, rows }, 'PTY created');
    return ok(undefined);
  }

  resize(cols: number, rows: number): BridgeResult {
    if (this.closed) {
      return err(new ChannelBridgeError('CHANNEL_CLOSED', `Channel ${this.channelId} is closed`));
    }
    if (!this.sender) {
      return err(new ChannelBridgeError('PTY_NOT_READY', 'Window change received before a PTY was requested'));
    }
    if (!validSize(cols, rows)) {
      return err(new ChannelBridgeError('INVALID_DIMENSIONS', `Invalid terminal size ${cols}x${rows}`));
    }

    this.dimensions = { cols, rows };
    this.sender.send(resizeEvent(cols, rows));
    this.log.debug({ cols, rows }, 'Window changed');
    return ok(undefined);
  }

  /** Drops the producer side; the render loop drains what is queued and stops. */
  close(): void {
    if (this.closed) return;
    this.state = 'closed';
    this.stopTicker();
    this.sender?.close();
  }

  info(): ChannelBridgeInfo {
    return {
      channelId: this.channelId,
      state: this.state,
      ptyCreated: this.ptyCreated,
      dimensions: this.dimensions ? { ...this.dimensions } : null,
    };
  }

  private async supervise(loop: RenderLoop): Promise<void> {
    let outcome: RenderLoopExit | Error;
    try {
      outcome = await loop.run();
      this.log.info({ reason: outcome, frames: loop.frameCount }, 'Render loop finished');
    } catch (error) {
      outcome = error instanceof Error ? error : new Error(String(error));
      if (outcome instanceof SinkClosedError) {
        this.log.info('Render loop stopped, channel output closed');
      } else {
        this.log.error({ err: outcome }, 'Render loop failed');
      }
    }

    this.close();
    this.options.onExit?.(outcome);
  }

  private startTicker(): void {
    const interval = this.options.tickInterval ?? 0;
    if (interval <= 0 || !this.sender) return;

    const sender = this.sender;
    this.ticker = setInterval(() => {
      sender.send(renderEvent());
    }, interval);
    this.ticker.unref();
  }

  private stopTicker(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
  }
}
