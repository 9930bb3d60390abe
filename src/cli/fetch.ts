/**
 * Fetch Command
 *
 * Turns facts + options into display lines and hands them to the renderer.
 */

import { colorModeFor, paint, paletteRows, type ColorMode } from './colors.js';
import { artWidth, getMascotArt } from './logo.js';
import { formatBytes, formatUptime, progressBar, truncateCpuModel } from '../core/format.js';
import type { Logger } from '../core/logger.js';
import { resolveTheme } from '../core/themes.js';
import type { DisplayLine, FetchOptions, SystemFacts, Theme } from '../core/types.js';
import { renderFetch, type RenderResult } from '../tui/fetch-render.js';
import type { RasterSupport } from '../tui/fetch-render-raster.js';
import type { Terminal } from '../tui/fetch-render-terminal.js';

export const MEMORY_BAR_WIDTH = 10;

/**
 * Columns left for the info column once the ASCII art and its gap are taken.
 */
export function infoColumnsFor(terminalColumns: number, artColumnWidth: number): number {
  return Math.max(0, terminalColumns - artColumnWidth);
}

export function buildDisplayLines(
  facts: SystemFacts,
  theme: Theme,
  options: Pick<FetchOptions, 'minimal'>,
  mode: ColorMode,
  infoColumns: number
): DisplayLine[] {
  const label = (s: string) => paint(s, theme.primary, mode, { bold: true });
  const value = (s: string) => paint(s, theme.info, mode);

  const title = `${facts.username}@${facts.hostname}`;
  const separator = '─'.repeat([...title].length);

  const lines: DisplayLine[] = [
    { label: '', value: paint(title, theme.primary, mode, { bold: true }) },
    { label: '', value: paint(separator, theme.secondary, mode) },
    { label: label('OS'), value: value(facts.osNameVersion) },
    { label: label('Kernel'), value: value(facts.kernelVersion) },
    { label: label('Uptime'), value: value(formatUptime(facts.uptimeSeconds)) },
    { label: label('Shell'), value: value(facts.shellName) },
  ];

  if (!options.minimal) {
    const cpu = truncateCpuModel(facts.cpuModel, facts.cpuCoreCount, infoColumns);
    lines.push({ label: label('CPU'), value: value(`${cpu} (${facts.cpuCoreCount} cores)`) });

    const bar = progressBar(facts.memoryUsedBytes, facts.memoryTotalBytes, MEMORY_BAR_WIDTH, theme, mode);
    lines.push({
      label: label('Memory'),
      value: `${formatBytes(facts.memoryUsedBytes)} / ${formatBytes(facts.memoryTotalBytes)} ${bar}`,
    });
  }

  lines.push({ label: '', value: '' });

  if (!options.minimal) {
    for (const row of paletteRows(mode)) {
      lines.push({ label: '', value: row });
    }
  }

  return lines;
}

export interface FetchDeps {
  facts: SystemFacts;
  terminal: Terminal;
  raster?: RasterSupport;
  logger?: Logger;
}

export async function runFetch(options: FetchOptions, deps: FetchDeps): Promise<RenderResult> {
  const mode = colorModeFor(options.color);
  const theme = resolveTheme(options.theme);
  const art = getMascotArt(options.minimal ? 'small' : 'full');
  const size = deps.terminal.size();

  const artColumn = options.art ? artWidth(art) + 2 : 0;
  const lines = buildDisplayLines(deps.facts, theme, options, mode, infoColumnsFor(size.columns, artColumn));

  return renderFetch(
    { lines, art, options, theme, mode, size },
    { terminal: deps.terminal, raster: deps.raster, logger: deps.logger }
  );
}
