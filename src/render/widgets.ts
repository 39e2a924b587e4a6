import { CellBuffer } from './CellBuffer.js';
import { inner, isEmpty, type Rect } from './Rect.js';

export interface Widget {
  render(area: Rect, buffer: CellBuffer): void;
}

export interface BlockOptions {
  borders?: boolean;
  title?: string;
}

const BORDER = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
} as const;

export class Block implements Widget {
  readonly borders: boolean;
  readonly title: string | undefined;

  constructor(options: BlockOptions = {}) {
    this.borders = options.borders ?? false;
    this.title = options.title;
  }

  static bordered(title?: string): Block {
    return new Block({ borders: true, title });
  }

  innerArea(area: Rect): Rect {
    return this.borders ? inner(area) : area;
  }

  render(area: Rect, buffer: CellBuffer): void {
    if (isEmpty(area) || !this.borders) return;

    const left = area.x;
    const right = area.x + area.width - 1;
    const top = area.y;
    const bottom = area.y + area.height - 1;

    for (let x = left; x <= right; x++) {
      buffer.set(x, top, BORDER.horizontal);
      buffer.set(x, bottom, BORDER.horizontal);
    }
    for (let y = top; y <= bottom; y++) {
      buffer.set(left, y, BORDER.vertical);
      buffer.set(right, y, BORDER.vertical);
    }
    buffer.set(left, top, BORDER.topLeft);
    buffer.set(right, top, BORDER.topRight);
    buffer.set(left, bottom, BORDER.bottomLeft);
    buffer.set(right, bottom, BORDER.bottomRight);

    // Title sits on the top border between the corners
    if (this.title && area.width > 2) {
      buffer.setString(left + 1, top, this.title, area.width - 2);
    }
  }
}

export class Paragraph implements Widget {
  readonly lines: string[];
  private block: Block | null = null;

  constructor(text: string) {
    this.lines = text.split('\n');
  }

  withBlock(block: Block): this {
    this.block = block;
    return this;
  }

  render(area: Rect, buffer: CellBuffer): void {
    let textArea = area;
    if (this.block) {
      this.block.render(area, buffer);
      textArea = this.block.innerArea(area);
    }
    if (isEmpty(textArea)) return;

    const visible = this.lines.slice(0, textArea.height);
    visible.forEach((line, offset) => {
      buffer.setString(textArea.x, textArea.y + offset, line, textArea.width);
    });
  }
}
