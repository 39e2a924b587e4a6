import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_CONFIG,
  loadConfigFile,
  loadConfig,
  loadEnvConfig,
  mergeConfig,
  parseConfigFile,
  reloadConfig,
  validateConfig,
  type AppConfig,
} from './index.js';

function withConfig(patch: (config: AppConfig) => void): AppConfig {
  const config = mergeConfig(DEFAULT_CONFIG, {});
  patch(config);
  return config;
}

describe('config', () => {
  it('merges env over file over defaults', () => {
    const fromFile = parseConfigFile(JSON.stringify({ ssh: { port: 2022, host: '127.0.0.1' }, render: { title: 'file' } }));
    const fromEnv = loadEnvConfig({ SSH_PORT: '2200', RENDER_TICK_INTERVAL: '50' });

    const config = mergeConfig(mergeConfig(DEFAULT_CONFIG, fromFile), fromEnv);

    expect(config.ssh).toEqual({ port: 2200, host: '127.0.0.1' });
    expect(config.render).toEqual({ tickInterval: 50, title: 'file' });
    expect(config.http).toEqual(DEFAULT_CONFIG.http);
  });

  it('leaves the defaults untouched', () => {
    mergeConfig(DEFAULT_CONFIG, { ssh: { port: 1 } });

    expect(DEFAULT_CONFIG.ssh.port).toBe(2222);
  });

  it('enables auth when a password hash is given', () => {
    const env = loadEnvConfig({ AUTH_PASSWORD_HASH: 'hash', AUTH_SECRET: 'test-secret' });

    expect(env.auth).toEqual({ passwordHash: 'hash', secret: 'test-secret', enabled: true });
  });

  it('returns nothing for an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({});
  });

  it('rejects malformed environment values', () => {
    expect(() => loadEnvConfig({ SSH_PORT: 'twenty' })).toThrow('SSH_PORT must be an integer, got "twenty"');
    expect(() => loadEnvConfig({ LOG_LEVEL: 'loud' })).toThrow('Unknown LOG_LEVEL "loud"');
  });

  it('rejects config files with wrongly typed fields', () => {
    expect(() => parseConfigFile(JSON.stringify({ ssh: { port: '22' } }))).toThrow();
  });

  it('reads the first existing config file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'termhost-config-'));
    const path = join(dir, 'config.json');
    writeFileSync(path, JSON.stringify({ logging: { level: 'debug' } }));

    expect(loadConfigFile([join(dir, 'missing.json'), path])).toEqual({ logging: { level: 'debug' } });
  });

  it('falls back to defaults when the file cannot be parsed', () => {
    const dir = mkdtempSync(join(tmpdir(), 'termhost-config-'));
    const path = join(dir, 'config.json');
    writeFileSync(path, '{ not json');

    expect(loadConfigFile([path])).toEqual({});
  });

  it('accepts the defaults', () => {
    expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
  });

  it('validates ports, tick interval and auth', () => {
    expect(() => validateConfig(withConfig((c) => { c.ssh.port = 0; }))).toThrow('Invalid SSH port number');
    expect(() => validateConfig(withConfig((c) => { c.http.port = 70000; }))).toThrow('Invalid HTTP port number');
    expect(() => validateConfig(withConfig((c) => { c.render.tickInterval = 5; }))).toThrow(
      'Render tick interval must be 0 or at least 16ms',
    );
    expect(() => validateConfig(withConfig((c) => {
      c.http.host = c.ssh.host;
      c.http.port = c.ssh.port;
    }))).toThrow('SSH and HTTP listeners cannot share a port');
    expect(() => validateConfig(withConfig((c) => { c.auth.enabled = true; }))).toThrow(
      'Auth password hash is required when auth is enabled',
    );
  });

  describe('loadConfig', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('caches until reloaded', () => {
      vi.stubEnv('RENDER_TICK_INTERVAL', '20');
      expect(reloadConfig().render.tickInterval).toBe(20);

      vi.stubEnv('RENDER_TICK_INTERVAL', '40');
      expect(loadConfig().render.tickInterval).toBe(20);
      expect(reloadConfig().render.tickInterval).toBe(40);
    });

    it('fails a reload that does not validate', () => {
      vi.stubEnv('RENDER_TICK_INTERVAL', '5');

      expect(() => reloadConfig()).toThrow('Render tick interval must be 0 or at least 16ms');
    });
  });
});
