/**
 * crabfetch - Formatting
 *
 * Pure conversions from raw facts to display strings.
 */

import { colors, paint, type ColorMode } from '../cli/colors.js';
import type { Theme } from './types.js';

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

const BAR_FILLED = '█';
const BAR_EMPTY = '░';

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/**
 * Uptime as "2d 3h 14m". Minutes are dropped when zero unless nothing larger
 * was printed, so the result is never empty.
 */
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const mins = Math.floor((seconds % 3600) / 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (mins > 0 || parts.length === 0) parts.push(`${mins}m`);
  return parts.join(' ');
}

export function formatBytes(bytes: number): string {
  if (bytes >= GB) {
    return `${(bytes / GB).toFixed(1)} GB`;
  }
  return `${(bytes / MB).toFixed(1)} MB`;
}

/**
 * Integer percentage in [0, 100]; 0 when total is 0.
 */
export function usagePercent(used: number, total: number): number {
  if (total <= 0) return 0;
  const pct = Math.trunc((used / total) * 100);
  return Math.min(100, Math.max(0, pct));
}

/**
 * "[████░░░░░░] 42%", red above 80%, amber above 60%, theme accent otherwise.
 */
export function progressBar(used: number, total: number, width: number, theme: Theme, mode: ColorMode): string {
  const percentage = usagePercent(used, total);
  const filled = Math.floor((percentage * width) / 100);
  const bar = `[${BAR_FILLED.repeat(filled)}${BAR_EMPTY.repeat(width - filled)}] ${percentage}%`;

  let color = theme.accent;
  if (percentage > 80) {
    color = colors.red;
  } else if (percentage > 60) {
    color = colors.yellow;
  }
  return paint(bar, color, mode);
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/**
 * Columns a string occupies, counted per code point after removing colors.
 */
export function displayWidth(text: string): number {
  return [...stripAnsi(text)].length;
}

export const CPU_LABEL_PREFIX = 'CPU: ';
const MIN_CPU_COLUMNS = 4;

/**
 * Shorten a CPU model so "CPU: <model> (N cores)" fits in infoColumns.
 * The budget never drops below 4 columns, even if the line then overflows.
 */
export function truncateCpuModel(model: string, cores: number, infoColumns: number): string {
  const suffix = ` (${cores} cores)`;
  const available = Math.max(MIN_CPU_COLUMNS, infoColumns - CPU_LABEL_PREFIX.length - suffix.length);
  const chars = [...model];
  if (chars.length <= available) return model;
  return `${chars.slice(0, available - 3).join('')}...`;
}
