/**
 * crabfetch - Theme Definitions
 *
 * Fixed palettes selectable with --theme. Lookup is case-insensitive and
 * never fails: anything unrecognised gets the default rust palette.
 */

import { colors, rgb } from '../cli/colors.js';
import type { Theme } from './types.js';

export const DEFAULT_THEME_NAME = 'rust';

const RUST: Theme = {
  primary: rgb(255, 128, 0),
  secondary: rgb(183, 65, 14),
  accent: rgb(255, 200, 100),
  info: colors.white,
};

const THEMES: Record<string, Theme> = {
  ocean: {
    primary: colors.cyan,
    secondary: colors.blue,
    accent: colors.brightCyan,
    info: colors.white,
  },
  forest: {
    primary: colors.green,
    secondary: colors.brightGreen,
    accent: colors.yellow,
    info: colors.white,
  },
  sunset: {
    primary: colors.red,
    secondary: colors.yellow,
    accent: colors.magenta,
    info: colors.white,
  },
  mono: {
    primary: colors.white,
    secondary: colors.white,
    accent: colors.white,
    info: colors.white,
  },
};

export const THEME_NAMES: readonly string[] = [DEFAULT_THEME_NAME, ...Object.keys(THEMES)];

export function resolveTheme(name: string): Theme {
  const key = name.toLowerCase();
  return Object.hasOwn(THEMES, key) ? THEMES[key] : RUST;
}
