import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';

import {
  DEFAULT_OPTIONS,
  flagOverrides,
  getConfigPath,
  loadConfigFile,
  loadEnvFiles,
  loadFetchOptions,
  optionsFromEnv,
  parseBooleanEnv,
  resolveFetchOptions,
} from './config.js';
import { silentLogger } from './logger.js';

describe('parseBooleanEnv', () => {
  it('understands common spellings', () => {
    expect(parseBooleanEnv('1')).toBe(true);
    expect(parseBooleanEnv(' YES ')).toBe(true);
    expect(parseBooleanEnv('off')).toBe(false);
    expect(parseBooleanEnv('0')).toBe(false);
  });

  it('ignores unset and unrecognised values', () => {
    expect(parseBooleanEnv(undefined)).toBeUndefined();
    expect(parseBooleanEnv('')).toBeUndefined();
    expect(parseBooleanEnv('maybe')).toBeUndefined();
  });
});

describe('optionsFromEnv', () => {
  it('reads theme, NO_COLOR and toggles', () => {
    expect(
      optionsFromEnv({
        CRABFETCH_THEME: 'forest',
        NO_COLOR: '1',
        CRABFETCH_MINIMAL: 'true',
        CRABFETCH_NO_ART: 'yes',
        CRABFETCH_DEBUG: 'on',
      })
    ).toEqual({ theme: 'forest', color: false, minimal: true, art: false, debug: true });
  });

  it('treats an empty NO_COLOR as unset', () => {
    expect(optionsFromEnv({ NO_COLOR: '' })).toEqual({});
  });
});

describe('flagOverrides', () => {
  it('drops commander defaults for negated flags', () => {
    expect(flagOverrides({ color: true, art: true })).toEqual({});
  });

  it('keeps what was typed', () => {
    expect(flagOverrides({ theme: 'ocean', color: false, minimal: true, art: false, debug: true })).toEqual({
      theme: 'ocean',
      color: false,
      minimal: true,
      art: false,
      debug: true,
    });
  });
});

describe('resolveFetchOptions', () => {
  it('uses defaults when nothing is set', () => {
    expect(resolveFetchOptions({}, {}, null)).toEqual(DEFAULT_OPTIONS);
  });

  it('prefers flags over env over the config file', () => {
    const options = resolveFetchOptions(
      { theme: 'ocean' },
      { theme: 'forest', color: false },
      { theme: 'sunset', color: true, minimal: true }
    );
    expect(options).toEqual({ theme: 'ocean', color: false, minimal: true, art: true, debug: false });
  });
});

describe('getConfigPath', () => {
  it('honours XDG_CONFIG_HOME', () => {
    expect(getConfigPath({ XDG_CONFIG_HOME: '/tmp/xdg' })).toBe(path.join('/tmp/xdg', 'crabfetch', 'config.json'));
  });

  it('defaults to ~/.config', () => {
    expect(getConfigPath({})).toBe(path.join(os.homedir(), '.config', 'crabfetch', 'config.json'));
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'crabfetch-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null quietly for a missing file', async () => {
    const logger = vi.fn();
    expect(await loadConfigFile(path.join(dir, 'missing.json'), logger)).toBeNull();
    expect(logger).not.toHaveBeenCalled();
  });

  it('reads a valid file', async () => {
    const file = path.join(dir, 'config.json');
    writeFileSync(file, JSON.stringify({ theme: 'mono', art: false }));
    expect(await loadConfigFile(file, silentLogger)).toEqual({ theme: 'mono', art: false });
  });

  it('ignores malformed JSON with a log line', async () => {
    const file = path.join(dir, 'config.json');
    writeFileSync(file, '{ theme: ');
    const logger = vi.fn();
    expect(await loadConfigFile(file, logger)).toBeNull();
    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger.mock.calls[0][0]).toContain(`[config] Ignoring ${file}`);
  });

  it('ignores a file that fails validation', async () => {
    const file = path.join(dir, 'config.json');
    writeFileSync(file, JSON.stringify({ color: 'yes' }));
    const logger = vi.fn();
    expect(await loadConfigFile(file, logger)).toBeNull();
    expect(logger.mock.calls[0][0]).toContain('color:');
  });

  it('merges the config file under env and flags', async () => {
    mkdirSync(path.join(dir, 'crabfetch'));
    writeFileSync(path.join(dir, 'crabfetch', 'config.json'), JSON.stringify({ theme: 'sunset', minimal: true }));

    const loggerFor = vi.fn(() => silentLogger);
    const { options } = await loadFetchOptions({ art: false }, { XDG_CONFIG_HOME: dir, NO_COLOR: '1' }, loggerFor);

    expect(options).toEqual({ theme: 'sunset', color: false, minimal: true, art: false, debug: false });
    expect(loggerFor).toHaveBeenCalledWith(false);
  });

  it('enables debug logging from the environment', async () => {
    const loggerFor = vi.fn(() => silentLogger);
    await loadFetchOptions({}, { XDG_CONFIG_HOME: dir, CRABFETCH_DEBUG: '1' }, loggerFor);
    expect(loggerFor).toHaveBeenCalledWith(true);
  });

  it('loads .env files without clobbering the environment', () => {
    writeFileSync(path.join(dir, '.env'), 'CF_A=from-env-file\nCF_B=from-env-file\n');
    writeFileSync(path.join(dir, '.env.local'), 'CF_B=from-local\nCF_C=from-local\n');
    const env: Record<string, string | undefined> = { CF_A: 'real' };

    expect(loadEnvFiles(dir, env)).toEqual([]);
    expect(env).toEqual({ CF_A: 'real', CF_B: 'from-local', CF_C: 'from-local' });
  });
});
