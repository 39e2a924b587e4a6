export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

export const EMPTY_RECT: Rect = Object.freeze(rect(0, 0, 0, 0));

export function isEmpty(area: Rect): boolean {
  return area.width === 0 || area.height === 0;
}

/** The area left inside a one-cell margin. Collapses to zero instead of going negative. */
export function inner(area: Rect): Rect {
  if (area.width < 2 || area.height < 2) {
    return rect(area.x, area.y, 0, 0);
  }
  return rect(area.x + 1, area.y + 1, area.width - 2, area.height - 2);
}
