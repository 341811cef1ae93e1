import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config.js';
import { configureLogger, levelForEnv, logger } from '../src/logger.js';

let savedLogLevel: string | undefined;

beforeEach(() => {
  savedLogLevel = process.env.LOG_LEVEL;
  delete process.env.LOG_LEVEL;
});

afterEach(() => {
  if (savedLogLevel === undefined) delete process.env.LOG_LEVEL;
  else process.env.LOG_LEVEL = savedLogLevel;
  configureLogger({ nodeEnv: 'test' });
  vi.restoreAllMocks();
});

describe('levelForEnv', () => {
  it('maps NODE_ENV to a default level', () => {
    expect(levelForEnv('production')).toBe('info');
    expect(levelForEnv('test')).toBe('error');
    expect(levelForEnv('staging')).toBe('debug');
    expect(levelForEnv(undefined)).toBe('debug');
  });
});

describe('configureLogger', () => {
  it('prefers the override, then logLevel, then nodeEnv', () => {
    expect(configureLogger({ logLevel: 'debug', nodeEnv: 'production' }, 'warn')).toBe('warn');
    expect(configureLogger({ logLevel: 'debug', nodeEnv: 'production' })).toBe('debug');
    expect(configureLogger({ nodeEnv: 'production' })).toBe('info');
  });

  it('drops entries below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    configureLogger({ nodeEnv: 'production' });

    logger.debug('hidden');
    logger.info('shown', { domain: 'a.test' });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(log.mock.calls[0]![0])).toMatchObject({
      level: 'info',
      event: 'shown',
      domain: 'a.test',
    });
  });

  it('honours LOG_LEVEL from a .env file once the config is loaded', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'logger-'));
    const envFile = path.join(dir, '.env');
    await writeFile(envFile, 'LOG_LEVEL=debug\n');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const config = loadConfig({}, process.env, { envFile });
    expect(config.logLevel).toBe('debug');
    expect(configureLogger(config)).toBe('debug');

    logger.info('run_started');
    expect(log).toHaveBeenCalledTimes(1);
  });
});
