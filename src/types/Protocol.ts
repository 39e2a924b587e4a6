import type { ConnectionInfo } from './Connection.js';

// Client -> Server messages
export interface ListConnectionsMessage {
  type: 'list-connections';
}

export interface DisconnectMessage {
  type: 'disconnect';
  connectionId: string;
}

export type ClientMessage =
  | ListConnectionsMessage
  | DisconnectMessage;

// Server -> Client messages
export interface ConnectionsMessage {
  type: 'connections';
  connections: ConnectionInfo[];
}

export interface ConnectionAddedMessage {
  type: 'connection-added';
  connection: ConnectionInfo;
}

export interface ConnectionUpdatedMessage {
  type: 'connection-updated';
  connection: ConnectionInfo;
}

export interface ConnectionRemovedMessage {
  type: 'connection-removed';
  connectionId: string;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  code?: string;
}

export type ServerMessage =
  | ConnectionsMessage
  | ConnectionAddedMessage
  | ConnectionUpdatedMessage
  | ConnectionRemovedMessage
  | ErrorMessage;

export function isClientMessage(msg: unknown): msg is ClientMessage {
  if (typeof msg !== 'object' || msg === null) return false;
  if (!('type' in msg)) return false;

  switch (msg.type) {
    case 'list-connections':
      return true;
    case 'disconnect':
      return 'connectionId' in msg && typeof msg.connectionId === 'string' && msg.connectionId.length > 0;
    default:
      return false;
  }
}
