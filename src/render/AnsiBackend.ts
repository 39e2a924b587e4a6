import type { OutputSink } from '../app/OutputSink.js';
import type { CellBuffer } from './CellBuffer.js';

const ESC = '\x1b[';

export const HIDE_CURSOR = `${ESC}?25l`;
export const CLEAR_SCREEN = `${ESC}2J`;

export const moveTo = (row: number, col: number): string => `${ESC}${row};${col}H`;

/**
 * Serializes whole frames as terminal control bytes.
 * Every frame repaints every row of the buffer; nothing is diffed.
 */
export class AnsiBackend {
  constructor(private readonly sink: OutputSink) {}

  encode(buffer: CellBuffer, clear: boolean): Buffer {
    let out = HIDE_CURSOR;
    if (clear) out += CLEAR_SCREEN;

    const { x, y } = buffer.area;
    buffer.rows().forEach((row, offset) => {
      out += moveTo(y + offset + 1, x + 1) + row;
    });
    return Buffer.from(out, 'utf8');
  }

  async flush(buffer: CellBuffer, clear: boolean): Promise<void> {
    await this.sink.write(this.encode(buffer, clear));
  }
}
