/** Redraw with the current application state. */
export interface RenderEvent {
  type: 'render';
}

/** Authoritative geometry reported by the remote terminal. */
export interface ResizeEvent {
  type: 'resize';
  width: number;
  height: number;
}

/** Raw bytes typed into the remote terminal, passed through unchanged. */
export interface InputEvent {
  type: 'input';
  data: Buffer;
}

export interface ShutdownEvent {
  type: 'shutdown';
}

export type AppEvent = RenderEvent | ResizeEvent | InputEvent | ShutdownEvent;

export const renderEvent = (): RenderEvent => ({ type: 'render' });

export const resizeEvent = (width: number, height: number): ResizeEvent => ({ type: 'resize', width, height });

export const inputEvent = (data: Buffer): InputEvent => ({ type: 'input', data });

export const shutdownEvent = (): ShutdownEvent => ({ type: 'shutdown' });
