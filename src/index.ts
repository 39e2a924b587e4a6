#!/usr/bin/env node
import { startServer } from './server/app.js';
import { loadConfig, reloadConfig } from './config/index.js';
import { logger, setLogLevel } from './utils/logger.js';

const config = loadConfig();
setLogLevel(config.logging.level);
logger.info({
  ssh: `${config.ssh.host}:${config.ssh.port}`,
  http: config.http.enabled ? `${config.http.host}:${config.http.port}` : 'disabled',
  auth: config.auth.enabled ? 'enabled' : 'disabled',
  tickInterval: config.render.tickInterval,
}, 'Starting with config');

startServer(config)
  .then((server) => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Shutting down');
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    // Listeners stay bound; only the log level follows a reload
    process.on('SIGHUP', () => {
      try {
        const next = reloadConfig();
        setLogLevel(next.logging.level);
        logger.info({ level: next.logging.level }, 'Config reloaded');
      } catch (err) {
        logger.error({ err }, 'Config reload failed, keeping current settings');
      }
    });
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  });
