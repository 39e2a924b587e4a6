import { randomUUID } from 'crypto';
import { readFileSync } from 'fs';
import type { AddressInfo } from 'net';
import ssh2 from 'ssh2';
import type { Connection, ClientInfo, Server, ServerChannel, Session } from 'ssh2';
import { ChannelOutput } from '../app/OutputSink.js';
import type { RenderConfig, SshConfig } from '../config/index.js';
import { ProtocolViolationError } from '../errors.js';
import type { ConnectionRegistry } from '../services/ConnectionRegistry.js';
import { SessionHandler } from '../services/SessionHandler.js';
import type { Ack } from '../types/Connection.js';
import type { TerminalAppFactory } from '../ui/TerminalApp.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface SshServerOptions {
  ssh: SshConfig;
  render: RenderConfig;
  registry: ConnectionRegistry;
  appFactory: TerminalAppFactory;
  logger?: Logger;
}

type Reply = (() => void) | undefined;

/** Answers a channel request; peers that sent want-reply=false get no reply. */
function reply(ack: Ack, accept: Reply, reject: Reply): void {
  if (ack === 'success') {
    accept?.();
  } else {
    reject?.();
  }
}

export function loadHostKey(config: SshConfig, log: Logger = rootLogger): Buffer | string {
  if (config.hostKeyPath) {
    return readFileSync(config.hostKeyPath);
  }
  log.warn('No host key configured, generating an ephemeral ed25519 key');
  return ssh2.utils.generateKeyPairSync('ed25519').private;
}

/**
 * SSH listener. Translates ssh2 connection and session events into
 * SessionHandler calls and the handler's acks back into replies.
 */
export class SshServerManager {
  private server: Server | null = null;
  private readonly options: SshServerOptions;
  private readonly log: Logger;

  constructor(options: SshServerOptions) {
    this.options = options;
    this.log = (options.logger ?? rootLogger).child({ component: 'ssh' });
  }

  async listen(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('SSH server is already listening');
    }

    const { ssh } = this.options;
    const server = new ssh2.Server(
      {
        hostKeys: [loadHostKey(ssh, this.log)],
        banner: ssh.banner,
      },
      (client, info) => this.handleConnection(client, info),
    );
    this.server = server;

    return new Promise<AddressInfo>((resolve, reject) => {
      server.once('error', reject);
      server.listen(ssh.port, ssh.host, () => {
        server.off('error', reject);
        server.on('error', (err: Error) => this.log.error({ err }, 'SSH server error'));

        const address = server.address();
        if (!address || typeof address === 'string') {
          reject(new Error(`Unexpected SSH listen address: ${String(address)}`));
          return;
        }
        this.log.info({ host: address.address, port: address.port }, 'SSH server listening');
        resolve(address);
      });
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    this.options.registry.closeAll();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  handleConnection(client: Connection, info: ClientInfo): void {
    const { registry, appFactory, render } = this.options;
    const connectionId = randomUUID();
    const log = this.log.child({ connectionId });
    const streams = new Map<number, ServerChannel>();
    let nextChannelId = 0;

    const handler = new SessionHandler(connectionId, {
      appFactory,
      tickInterval: render.tickInterval,
      remote: { ip: info.ip, port: info.port, clientVersion: info.header.versions.software },
      logger: this.log,
      onChange: (changed) => registry.update(changed),
      onChannelExit: (channelId) => {
        const stream = streams.get(channelId);
        if (stream && !stream.destroyed) {
          stream.exit(0);
          stream.end();
        }
      },
    });

    registry.register(handler, () => client.end());
    log.info({ ip: info.ip, port: info.port }, 'Client connected');

    client.on('authentication', (ctx) => {
      handler.authenticate(ctx.method, ctx.username);
      ctx.accept();
    });

    client.on('session', (accept, reject) => {
      const channelId = nextChannelId++;
      try {
        handler.openChannel(channelId);
      } catch (err) {
        if (!(err instanceof ProtocolViolationError)) throw err;
        log.warn({ err, channelId }, 'Rejecting channel, closing connection');
        reject();
        client.end();
        return;
      }

      this.attachSession(accept(), channelId, handler, streams, log);
    });

    client.on('error', (err) => {
      log.warn({ err }, 'Client connection error');
    });

    client.on('close', () => {
      handler.close();
      registry.unregister(connectionId);
      log.info('Client disconnected');
    });
  }

  private attachSession(
    session: Session,
    channelId: number,
    handler: SessionHandler,
    streams: Map<number, ServerChannel>,
    log: Logger,
  ): void {
    const output = new ChannelOutput();

    session.on('pty', (accept, reject, info) => {
      reply(handler.requestPty(channelId, output, info.cols, info.rows), accept, reject);
    });

    session.on('window-change', (accept, reject, info) => {
      reply(handler.requestResize(channelId, info.cols, info.rows), accept, reject);
    });

    session.on('shell', (accept, reject) => {
      if (output.bound || handler.requestShell(channelId) === 'failure') {
        reject?.();
        return;
      }

      const stream = accept();
      streams.set(channelId, stream);
      output.bind(stream);

      // Channel data carries no reply; a refused write is logged by the handler
      stream.on('data', (data: Buffer) => {
        handler.forwardInput(channelId, data);
      });
      stream.on('close', () => {
        streams.delete(channelId);
        handler.closeChannel(channelId);
      });
    });

    session.on('env', (accept) => {
      accept?.();
    });

    session.on('exec', (_accept, reject) => {
      log.debug({ channelId }, 'Rejecting exec request');
      reject?.();
    });

    session.on('subsystem', (_accept, reject) => {
      log.debug({ channelId }, 'Rejecting subsystem request');
      reject?.();
    });

    session.on('close', () => {
      output.close();
      handler.closeChannel(channelId);
    });
  }
}
