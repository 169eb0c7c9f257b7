import { afterEach, describe, expect, it, vi } from 'vitest';
import { normalizeConfig } from '../../../src/infra/config/config.js';
import { createLogger } from '../../../src/infra/logger/logger.js';

describe('normalizeConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('fills defaults and disables QQ in prod without a token', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const cfg = normalizeConfig({}, {});

    expect(cfg.app).toEqual({ name: 'SteamPresenceBot', env: 'prod' });
    expect(cfg.logging).toEqual({ color: true, level: 'info' });
    expect(cfg.adapters.qq).toEqual({ enabled: false, wsPort: 6090, token: undefined });
    expect(cfg.steam).toEqual({
      enabled: false,
      apiKey: '',
      baseUrl: 'https://api.steampowered.com',
      timeoutMs: 8000,
      dataFile: './data/steam-aliases.json',
    });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('takes secrets and switches from the environment', () => {
    const cfg = normalizeConfig(
      { app: { env: 'prod' }, steam: { enabled: true, apiKey: '' } },
      { NODE_ENV: 'test', STEAM_API_KEY: ' test-key ', QQ_ADAPTER_TOKEN: 'test-token' },
    );
    expect(cfg.app.env).toBe('test');
    expect(cfg.steam.enabled).toBe(true);
    expect(cfg.steam.apiKey).toBe('test-key');
    expect(cfg.adapters.qq).toEqual({ enabled: true, wsPort: 6090, token: 'test-token' });
  });

  it('lets STEAM_ENABLED override the file', () => {
    const cfg = normalizeConfig({ app: { env: 'dev' }, steam: { enabled: true } }, { STEAM_ENABLED: 'false' });
    expect(cfg.steam.enabled).toBe(false);
  });

  it('falls back from logging.level to logger.level', () => {
    const cfg = normalizeConfig({ app: { env: 'dev' }, logger: { level: 'debug' } });
    expect(cfg.logging.level).toBe('debug');
  });

  it('rejects values of the wrong type', () => {
    expect(() => normalizeConfig({ steam: { timeoutMs: 'soon' } })).toThrow();
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters below the configured level and prints plain tags without color', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger({ logging: { level: 'warn', color: false } });

    logger.info('test', 'hidden');
    logger.warn('test', 'shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^\d{4}-\d{2}-\d{2} [\d:.]+ \[WARN\] \[test\] shown$/);
  });
});
