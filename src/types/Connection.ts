import type { ChannelBridgeInfo } from './Terminal.js';

/** Protocol state of one SSH connection */
export type SessionState =
  | 'unauthenticated'
  | 'authenticated'
  | 'channel-requested'
  | 'pty-ready'
  | 'closed';

export type AuthMethod = 'none' | 'password' | 'publickey' | 'keyboard-interactive' | 'hostbased';

/** Reply to a channel request */
export type Ack = 'success' | 'failure';

/** Peer address of an accepted transport */
export interface RemoteInfo {
  ip: string;
  port: number;
  clientVersion?: string;
}

/** Snapshot of a connection for the admin surface */
export interface ConnectionInfo {
  id: string;
  state: SessionState;
  username: string | null;
  remote: RemoteInfo | null;
  channel: ChannelBridgeInfo | null;
  connectedAt: string;
  lastActivityAt: string;
}
