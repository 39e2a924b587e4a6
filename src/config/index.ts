import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import type { LevelWithSilent } from 'pino';
import { z } from 'zod';
import { isLogLevel, logger } from '../utils/logger.js';

export interface SshConfig {
  port: number;
  host: string;
  /** Private host key; an ephemeral key is generated when unset */
  hostKeyPath?: string;
  banner?: string;
}

export interface HttpConfig {
  enabled: boolean;
  port: number;
  host: string;
}

export interface RenderConfig {
  /** Periodic redraw in ms, 0 disables it */
  tickInterval: number;
  title: string;
}

export interface LoggingConfig {
  level: LevelWithSilent;
}

export interface AuthConfig {
  enabled: boolean;
  secret: string;
  tokenExpiry: number;
  username: string;
  passwordHash: string;
}

export interface AppConfig {
  ssh: SshConfig;
  http: HttpConfig;
  render: RenderConfig;
  logging: LoggingConfig;
  auth: AuthConfig;
}

export type PartialConfig = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

const DEFAULT_CONFIG: AppConfig = {
  ssh: {
    port: 2222,
    host: '0.0.0.0',
  },
  http: {
    enabled: true,
    port: 3000,
    host: '127.0.0.1',
  },
  render: {
    tickInterval: 0,
    title: 'termhost',
  },
  logging: {
    level: 'info',
  },
  auth: {
    enabled: false,
    secret: 'change-this-secret-in-production',
    tokenExpiry: 86400,
    username: 'admin',
    passwordHash: '',
  },
};

export const CONFIG_PATHS = [
  join(process.cwd(), 'config', 'config.json'),
  join(homedir(), '.config', 'termhost', 'config.json'),
];

const FileConfigSchema = z.object({
  ssh: z
    .object({
      port: z.number().int(),
      host: z.string(),
      hostKeyPath: z.string(),
      banner: z.string(),
    })
    .partial()
    .optional(),
  http: z
    .object({
      enabled: z.boolean(),
      port: z.number().int(),
      host: z.string(),
    })
    .partial()
    .optional(),
  render: z
    .object({
      tickInterval: z.number().int(),
      title: z.string(),
    })
    .partial()
    .optional(),
  logging: z
    .object({
      level: z.custom<LevelWithSilent>((value) => typeof value === 'string' && isLogLevel(value)),
    })
    .partial()
    .optional(),
  auth: z
    .object({
      enabled: z.boolean(),
      secret: z.string(),
      tokenExpiry: z.number().int(),
      username: z.string(),
      passwordHash: z.string(),
    })
    .partial()
    .optional(),
});

export function parseConfigFile(content: string): PartialConfig {
  return FileConfigSchema.parse(JSON.parse(content));
}

export function loadConfigFile(paths: string[] = CONFIG_PATHS): PartialConfig {
  for (const configPath of paths) {
    if (existsSync(configPath)) {
      try {
        const config = parseConfigFile(readFileSync(configPath, 'utf-8'));
        logger.info({ path: configPath }, 'Loaded config');
        return config;
      } catch (err) {
        logger.error({ err, path: configPath }, 'Failed to load config');
      }
    }
  }
  return {};
}

function parseIntEnv(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const ssh: Partial<SshConfig> = {};
  const http: Partial<HttpConfig> = {};
  const render: Partial<RenderConfig> = {};
  const logging: Partial<LoggingConfig> = {};
  const auth: Partial<AuthConfig> = {};

  // SSH listener
  if (env.SSH_PORT) ssh.port = parseIntEnv(env.SSH_PORT, 'SSH_PORT');
  if (env.SSH_HOST) ssh.host = env.SSH_HOST;
  if (env.SSH_HOST_KEY) ssh.hostKeyPath = env.SSH_HOST_KEY;

  // Admin API
  if (env.HTTP_ENABLED) http.enabled = env.HTTP_ENABLED === 'true';
  if (env.HTTP_PORT) http.port = parseIntEnv(env.HTTP_PORT, 'HTTP_PORT');
  if (env.HTTP_HOST) http.host = env.HTTP_HOST;

  if (env.RENDER_TICK_INTERVAL) {
    render.tickInterval = parseIntEnv(env.RENDER_TICK_INTERVAL, 'RENDER_TICK_INTERVAL');
  }

  if (env.LOG_LEVEL) {
    if (!isLogLevel(env.LOG_LEVEL)) {
      throw new Error(`Unknown LOG_LEVEL "${env.LOG_LEVEL}"`);
    }
    logging.level = env.LOG_LEVEL;
  }

  // Auth config
  if (env.AUTH_ENABLED) auth.enabled = env.AUTH_ENABLED === 'true';
  if (env.AUTH_SECRET) auth.secret = env.AUTH_SECRET;
  if (env.AUTH_TOKEN_EXPIRY) auth.tokenExpiry = parseIntEnv(env.AUTH_TOKEN_EXPIRY, 'AUTH_TOKEN_EXPIRY');
  if (env.AUTH_USERNAME) auth.username = env.AUTH_USERNAME;
  if (env.AUTH_PASSWORD_HASH) {
    auth.passwordHash = env.AUTH_PASSWORD_HASH;
    auth.enabled = true;
  }

  const config: PartialConfig = {};
  if (Object.keys(ssh).length > 0) config.ssh = ssh;
  if (Object.keys(http).length > 0) config.http = http;
  if (Object.keys(render).length > 0) config.render = render;
  if (Object.keys(logging).length > 0) config.logging = logging;
  if (Object.keys(auth).length > 0) config.auth = auth;
  return config;
}

function definedEntries<T extends object>(source: Partial<T>): Partial<T> {
  const result: Partial<T> = {};
  for (const key in source) {
    if (source[key] !== undefined) {
      result[key] = source[key];
    }
  }
  return result;
}

export function mergeConfig(target: AppConfig, source: PartialConfig): AppConfig {
  return {
    ssh: { ...target.ssh, ...definedEntries<SshConfig>(source.ssh ?? {}) },
    http: { ...target.http, ...definedEntries<HttpConfig>(source.http ?? {}) },
    render: { ...target.render, ...definedEntries<RenderConfig>(source.render ?? {}) },
    logging: { ...target.logging, ...definedEntries<LoggingConfig>(source.logging ?? {}) },
    auth: { ...target.auth, ...definedEntries<AuthConfig>(source.auth ?? {}) },
  };
}

function validPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

export function validateConfig(config: AppConfig): void {
  if (!validPort(config.ssh.port)) {
    throw new Error('Invalid SSH port number');
  }
  if (config.http.enabled && !validPort(config.http.port)) {
    throw new Error('Invalid HTTP port number');
  }
  if (config.ssh.port === config.http.port && config.http.enabled && config.ssh.host === config.http.host) {
    throw new Error('SSH and HTTP listeners cannot share a port');
  }
  const { tickInterval } = config.render;
  if (!Number.isInteger(tickInterval) || (tickInterval !== 0 && tickInterval < 16)) {
    throw new Error('Render tick interval must be 0 or at least 16ms');
  }
  if (!isLogLevel(config.logging.level)) {
    throw new Error(`Unknown log level "${config.logging.level}"`);
  }
  if (config.auth.enabled && !config.auth.secret) {
    throw new Error('Auth secret is required when auth is enabled');
  }
  if (config.auth.enabled && !config.auth.passwordHash) {
    throw new Error('Auth password hash is required when auth is enabled');
  }
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  // Priority: env > file > defaults
  let config = mergeConfig(DEFAULT_CONFIG, loadConfigFile());
  config = mergeConfig(config, loadEnvConfig());

  validateConfig(config);

  cachedConfig = config;
  return config;
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}

export { DEFAULT_CONFIG };
