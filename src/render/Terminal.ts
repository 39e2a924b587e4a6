import { AnsiBackend } from './AnsiBackend.js';
import { CellBuffer } from './CellBuffer.js';
import { EMPTY_RECT, isEmpty, type Rect } from './Rect.js';
import type { Widget } from './widgets.js';

export interface Frame {
  readonly area: Rect;
  renderWidget(widget: Widget, area: Rect): void;
}

/** Fixed-viewport terminal: the viewport changes only through `resize`. */
export class Terminal {
  private viewport: Rect = EMPTY_RECT;
  private clearPending = true;
  private released = false;

  constructor(private readonly backend: AnsiBackend) {}

  get area(): Rect {
    return this.viewport;
  }

  resize(area: Rect): void {
    this.viewport = { ...area };
    this.clearPending = true;
  }

  /**
   * Draws one frame over the current viewport and writes it out.
   * Returns the frame area, or null when the viewport is empty and nothing was drawn.
   */
  async draw(render: (frame: Frame) => void): Promise<Rect | null> {
    if (this.released) {
      throw new Error('Terminal has been released');
    }
    if (isEmpty(this.viewport)) return null;

    const area = { ...this.viewport };
    const buffer = new CellBuffer(area);
    render({
      area,
      renderWidget: (widget, target) => widget.render(target, buffer),
    });

    const clear = this.clearPending;
    this.clearPending = false;
    await this.backend.flush(buffer, clear);
    return area;
  }

  release(): void {
    this.released = true;
  }
}
