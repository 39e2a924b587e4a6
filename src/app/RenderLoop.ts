import { UnsupportedEventError } from '../errors.js';
import { AnsiBackend } from '../render/AnsiBackend.js';
import { rect, type Rect } from '../render/Rect.js';
import { Terminal } from '../render/Terminal.js';
import type { TerminalApp } from '../ui/TerminalApp.js';
import type { Logger } from '../utils/logger.js';
import type { AppEvent } from './events.js';
import type { EventReceiver } from './EventQueue.js';
import type { OutputSink } from './OutputSink.js';

export type RenderLoopExit = 'end-of-stream' | 'shutdown' | 'app-exit';

export interface RenderLoopOptions {
  app: TerminalApp;
  sink: OutputSink;
  events: EventReceiver<AppEvent>;
  logger?: Logger;
}

/**
 * Single consumer of a channel's event queue and the only writer of its output.
 */
export class RenderLoop {
  private readonly app: TerminalApp;
  private readonly events: EventReceiver<AppEvent>;
  private readonly terminal: Terminal;
  private readonly logger: Logger | undefined;
  private frames = 0;
  private running = false;

  constructor(options: RenderLoopOptions) {
    this.app = options.app;
    this.events = options.events;
    this.logger = options.logger;
    this.terminal = new Terminal(new AnsiBackend(options.sink));
  }

  get viewport(): Rect {
    return this.terminal.area;
  }

  get frameCount(): number {
    return this.frames;
  }

  async run(): Promise<RenderLoopExit> {
    if (this.running) {
      throw new Error('RenderLoop is already running');
    }
    this.running = true;

    try {
      for (;;) {
        const event = await this.events.recv();
        if (event === undefined) return 'end-of-stream';

        const exit = await this.handle(event);
        if (exit) return exit;
      }
    } finally {
      this.terminal.release();
      this.logger?.debug({ frames: this.frames }, 'Render loop stopped');
    }
  }

  private async handle(event: AppEvent): Promise<RenderLoopExit | null> {
    switch (event.type) {
      case 'render':
        await this.render();
        return null;

      case 'resize':
        this.terminal.resize(rect(0, 0, event.width, event.height));
        // Repaint now so nothing drawn at the old size stays on screen
        await this.render();
        return null;

      case 'input': {
        const outcome = this.app.handleInput(event.data);
        if (outcome === 'exit') return 'app-exit';
        if (outcome === 'render') await this.render();
        return null;
      }

      case 'shutdown':
        return 'shutdown';

      default:
        throw new UnsupportedEventError(event);
    }
  }

  private async render(): Promise<void> {
    const area = await this.terminal.draw((frame) => this.app.draw(frame));
    if (area) this.frames++;
  }
}
