import type { Frame } from '../render/Terminal.js';

/** What the render loop does after handing input to the application. */
export type InputOutcome = 'render' | 'ignore' | 'exit';

/** Application hosted inside one channel. */
export interface TerminalApp {
  draw(frame: Frame): void;
  handleInput(data: Buffer): InputOutcome;
}

export type TerminalAppFactory = () => TerminalApp;
