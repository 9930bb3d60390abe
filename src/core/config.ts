/**
 * crabfetch - Config Loader
 *
 * Resolution order: CLI flags > process.env > config.json > defaults.
 *
 * The config file lives at $XDG_CONFIG_HOME/crabfetch/config.json, falling
 * back to ~/.config/crabfetch/config.json. A broken file never stops the
 * display; it is reported through the debug logger and ignored.
 */

import { readFile } from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import os from 'os';
import { parse } from 'dotenv';
import { z } from 'zod';

import type { Logger } from './logger.js';
import type { FetchOptions } from './types.js';
import { DEFAULT_THEME_NAME } from './themes.js';

// ============================================================================
// Types
// ============================================================================

const ConfigFileSchema = z.object({
  theme: z.string().min(1).optional(),
  color: z.boolean().optional(),
  minimal: z.boolean().optional(),
  art: z.boolean().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Only the options a source actually set. */
export type OptionOverrides = Partial<FetchOptions>;

export type Env = Record<string, string | undefined>;

export const DEFAULT_OPTIONS: FetchOptions = {
  theme: DEFAULT_THEME_NAME,
  color: true,
  minimal: false,
  art: true,
  debug: false,
};

// ============================================================================
// Paths
// ============================================================================

export function getConfigPath(env: Env = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'crabfetch', 'config.json');
}

// ============================================================================
// .env files
// ============================================================================

/**
 * Load .env then .env.local from a directory into env. Existing variables win
 * over .env; .env.local overrides .env. Returns a message per file that could
 * not be read, for the caller to log once a logger exists.
 */
export function loadEnvFiles(dir: string, env: Env = process.env): string[] {
  const problems: string[] = [];
  const files: Array<[string, boolean]> = [
    ['.env', false],
    ['.env.local', true],
  ];
  const fromFiles = new Set<string>();

  for (const [name, override] of files) {
    const filePath = path.join(dir, name);
    if (!existsSync(filePath)) continue;
    try {
      const parsed = parse(readFileSync(filePath, 'utf-8'));
      for (const [key, value] of Object.entries(parsed)) {
        const fromEarlierFile = fromFiles.has(key);
        if (env[key] === undefined || (override && fromEarlierFile)) {
          env[key] = value;
          fromFiles.add(key);
        }
      }
    } catch (error) {
      problems.push(`[config] Could not read ${filePath}: ${error}`);
    }
  }
  return problems;
}

// ============================================================================
// Environment
// ============================================================================

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parse a boolean-ish env var. Unset, empty or unrecognised values are undefined.
 */
export function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}

export function optionsFromEnv(env: Env): OptionOverrides {
  const overrides: OptionOverrides = {};

  const theme = env.CRABFETCH_THEME?.trim();
  if (theme) overrides.theme = theme;

  // https://no-color.org: any non-empty value disables color
  if (env.NO_COLOR) overrides.color = false;

  const minimal = parseBooleanEnv(env.CRABFETCH_MINIMAL);
  if (minimal !== undefined) overrides.minimal = minimal;

  const noArt = parseBooleanEnv(env.CRABFETCH_NO_ART);
  if (noArt !== undefined) overrides.art = !noArt;

  const debug = parseBooleanEnv(env.CRABFETCH_DEBUG);
  if (debug !== undefined) overrides.debug = debug;

  return overrides;
}

// ============================================================================
// CLI flags
// ============================================================================

/**
 * Options as commander hands them over. The --no-* flags default to true.
 */
export interface CliFlags {
  theme?: string;
  color: boolean;
  minimal?: boolean;
  art: boolean;
  debug?: boolean;
}

/**
 * Only options the user actually typed override env and config file.
 */
export function flagOverrides(flags: CliFlags): OptionOverrides {
  const overrides: OptionOverrides = {};
  if (flags.theme) overrides.theme = flags.theme;
  if (flags.color === false) overrides.color = false;
  if (flags.minimal) overrides.minimal = true;
  if (flags.art === false) overrides.art = false;
  if (flags.debug) overrides.debug = true;
  return overrides;
}

// ============================================================================
// Config file
// ============================================================================

/**
 * Read and validate the config file. Returns null when it is missing or unusable.
 */
export async function loadConfigFile(filePath: string, logger: Logger): Promise<ConfigFile | null> {
  if (!existsSync(filePath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    logger(`[config] Ignoring ${filePath}: ${error}`);
    return null;
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    logger(`[config] Ignoring ${filePath}: ${issues.join('; ')}`);
    return null;
  }
  return result.data;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * First source that set the key wins; sources are given highest priority first.
 */
function pick<K extends keyof FetchOptions>(key: K, sources: OptionOverrides[]): FetchOptions[K] {
  for (const source of sources) {
    const value = source[key];
    if (value !== undefined) return value;
  }
  return DEFAULT_OPTIONS[key];
}

export function resolveFetchOptions(
  flags: OptionOverrides,
  env: OptionOverrides,
  file: ConfigFile | null
): FetchOptions {
  const sources: OptionOverrides[] = [flags, env, file ?? {}];
  return {
    theme: pick('theme', sources),
    color: pick('color', sources),
    minimal: pick('minimal', sources),
    art: pick('art', sources),
    debug: pick('debug', sources),
  };
}

/**
 * Merge every source into the final options for this run.
 */
export async function loadFetchOptions(
  flags: OptionOverrides,
  env: Env,
  loggerFor: (debug: boolean) => Logger
): Promise<{ options: FetchOptions; logger: Logger }> {
  const fromEnv = optionsFromEnv(env);
  // Debug can only come from flags or env, so the logger exists before the file is read
  const logger = loggerFor(flags.debug ?? fromEnv.debug ?? DEFAULT_OPTIONS.debug);
  const file = await loadConfigFile(getConfigPath(env), logger);
  return { options: resolveFetchOptions(flags, fromEnv, file), logger };
}
