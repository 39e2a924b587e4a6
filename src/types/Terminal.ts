/** Channel lifecycle as seen from the bridge */
export type ChannelState =
  | 'open'
  | 'pty-ready'
  | 'closed';

/** Terminal dimensions in character cells */
export interface Dimensions {
  cols: number;
  rows: number;
}

/** Snapshot of a channel bridge */
export interface ChannelBridgeInfo {
  channelId: number;
  state: ChannelState;
  ptyCreated: boolean;
  dimensions: Dimensions | null;
}
