import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { authRoutes } from '../api/auth.js';
import { connectionRoutes } from '../api/connections.js';
import type { AppConfig } from '../config/index.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import { AuthService } from '../services/AuthService.js';
import { connectionRegistry, type ConnectionRegistry } from '../services/ConnectionRegistry.js';
import { HelloApp } from '../ui/HelloApp.js';
import type { TerminalAppFactory } from '../ui/TerminalApp.js';
import { logger } from '../utils/logger.js';
import { MessageHandler } from './MessageHandler.js';
import { SshServerManager } from './SshServer.js';
import { WebSocketServerManager } from './WebSocketServer.js';

export interface AppDependencies {
  config: AppConfig;
  registry?: ConnectionRegistry;
  authService?: AuthService;
}

export async function createApp(deps: AppDependencies): Promise<FastifyInstance> {
  const { config } = deps;
  const registry = deps.registry ?? connectionRegistry;
  const authService = deps.authService ?? new AuthService(config.auth);

  const app = Fastify({ logger: { level: config.logging.level } });

  // The admin API is meant for local tooling
  await app.register(cors, {
    origin: [`http://localhost:${config.http.port}`, `http://127.0.0.1:${config.http.port}`],
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  });

  // Auth middleware (skips if auth disabled)
  app.addHook('preHandler', createAuthMiddleware(authService));

  // Root endpoint
  app.get('/', async () => ({
    name: 'termhost',
    version: '0.1.0',
    endpoints: {
      health: '/health',
      connections: '/api/connections',
      websocket: '/ws',
    },
    ssh: {
      host: config.ssh.host,
      port: config.ssh.port,
    },
  }));

  // Health check endpoint
  app.get('/health', async () => ({ status: 'ok', connections: registry.size() }));

  await authRoutes(app, authService);
  await connectionRoutes(app, registry);

  // Global error handler
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    app.log.error(error);
    const status = error.statusCode ?? 500;
    reply.status(status).send({
      error: error.message || 'Internal Server Error',
      code: error.code || 'INTERNAL_ERROR',
    });
  });

  return app;
}

export interface RunningServer {
  sshPort: number;
  httpPort: number | null;
  close(): Promise<void>;
}

export async function startServer(config: AppConfig, appFactory?: TerminalAppFactory): Promise<RunningServer> {
  const registry = connectionRegistry;
  const authService = new AuthService(config.auth);

  const ssh = new SshServerManager({
    ssh: config.ssh,
    render: config.render,
    registry,
    appFactory: appFactory ?? (() => new HelloApp({ title: config.render.title })),
  });
  const sshAddress = await ssh.listen();

  if (!config.http.enabled) {
    return { sshPort: sshAddress.port, httpPort: null, close: () => ssh.close() };
  }

  const app = await createApp({ config, registry, authService });
  const webSocketServer = new WebSocketServerManager(new MessageHandler(registry), authService);
  webSocketServer.initialize(app.server);

  await app.listen({ port: config.http.port, host: config.http.host });
  const httpAddress = app.server.address();
  const httpPort = httpAddress && typeof httpAddress !== 'string' ? httpAddress.port : config.http.port;
  logger.info({ host: config.http.host, port: httpPort }, 'Admin API listening');

  return {
    sshPort: sshAddress.port,
    httpPort,
    close: async () => {
      webSocketServer.close();
      await app.close();
      await ssh.close();
    },
  };
}
