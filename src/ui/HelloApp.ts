import { Block, Paragraph } from '../render/widgets.js';
import type { Frame } from '../render/Terminal.js';
import type { InputOutcome, TerminalApp } from './TerminalApp.js';

const CTRL_C = 0x03;
const QUIT_KEY = 0x71; // 'q'

export interface HelloAppOptions {
  title?: string;
  message?: string;
}

export class HelloApp implements TerminalApp {
  private readonly title: string | undefined;
  private readonly message: string;

  constructor(options: HelloAppOptions = {}) {
    this.title = options.title;
    this.message = options.message ?? 'hello world';
  }

  draw(frame: Frame): void {
    const paragraph = new Paragraph(this.message).withBlock(Block.bordered(this.title));
    frame.renderWidget(paragraph, frame.area);
  }

  handleInput(data: Buffer): InputOutcome {
    // A lone keystroke; pasted text that happens to contain a q does not quit
    if (data.length === 1 && (data[0] === CTRL_C || data[0] === QUIT_KEY)) {
      return 'exit';
    }
    return 'ignore';
  }
}
