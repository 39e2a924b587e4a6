import stringWidth from 'string-width';
import type { Rect } from './Rect.js';

const BLANK = ' ';
// Trailing cell of a double-width symbol; serializes to nothing
const CONTINUATION = '';

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Grid of terminal cells covering `area`. A wide symbol takes its own cell
 * plus continuation cells, so each row serializes to exactly `width` columns.
 * Coordinates passed to the setters are absolute, like the area's.
 */
export class CellBuffer {
  readonly area: Rect;
  private cells: string[];

  constructor(area: Rect) {
    this.area = area;
    this.cells = new Array<string>(area.width * area.height).fill(BLANK);
  }

  private indexOf(x: number, y: number): number | null {
    const { area } = this;
    if (x < area.x || y < area.y || x >= area.x + area.width || y >= area.y + area.height) {
      return null;
    }
    return (y - area.y) * area.width + (x - area.x);
  }

  get(x: number, y: number): string | undefined {
    const index = this.indexOf(x, y);
    return index === null ? undefined : this.cells[index];
  }

  set(x: number, y: number, symbol: string): void {
    const index = this.indexOf(x, y);
    if (index !== null) {
      this.cells[index] = symbol;
    }
  }

  /**
   * Writes `text` from (x, y) rightwards, at most `maxWidth` columns, clipped at
   * the buffer edge. A symbol that would only partly fit is dropped.
   * Returns the number of columns written.
   */
  setString(x: number, y: number, text: string, maxWidth = Number.POSITIVE_INFINITY): number {
    let written = 0;
    for (const { segment } of graphemes.segment(text)) {
      const width = stringWidth(segment);
      if (width === 0) continue;
      if (written + width > maxWidth) break;
      if (this.indexOf(x + written + width - 1, y) === null) break;

      this.set(x + written, y, segment);
      for (let offset = 1; offset < width; offset++) {
        this.set(x + written + offset, y, CONTINUATION);
      }
      written += width;
    }
    return written;
  }

  rows(): string[] {
    const { width, height } = this.area;
    const rows: string[] = [];
    for (let row = 0; row < height; row++) {
      rows.push(this.cells.slice(row * width, (row + 1) * width).join(''));
    }
    return rows;
  }
}
