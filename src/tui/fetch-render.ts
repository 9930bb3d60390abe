/**
 * Fetch Render
 *
 * Lays the info column out beside the mascot. With room to spare and a
 * capable terminal the mascot is an inline image and the text is placed next
 * to it by cursor movement; otherwise (or on any failure while preparing the
 * image) it is ASCII art printed row by row with the text.
 *
 * The raster attempt does all of its fallible work before writing anything,
 * so fallback output can never land on top of a half-printed image.
 */

import { paint, type ColorMode } from '../cli/colors.js';
import { artWidth } from '../cli/logo.js';
import { displayWidth } from '../core/format.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type { DisplayLine, FetchOptions, TerminalSize, Theme } from '../core/types.js';
import type { EncodedImage, RasterImage, RasterSupport } from './fetch-render-raster.js';
import type { Terminal, TerminalCommand } from './fetch-render-terminal.js';

export const MIN_IMAGE_WIDTH = 10;
export const MAX_IMAGE_WIDTH = 40;
/** Pixels rasterized per target column; the encoder scales down from here */
export const PIXELS_PER_CELL = 8;

const COLUMN_GAP = 2;

// ============================================================================
// Types
// ============================================================================

export type FallbackReason =
  | 'art-disabled'
  | 'minimal'
  | 'no-raster-support'
  | 'too-narrow'
  | 'too-short'
  | 'decode-failed'
  | 'unsupported'
  | 'encode-failed';

export type RasterAttempt =
  | { kind: 'rendered'; rows: number; imageWidth: number; imageHeight: number }
  | { kind: 'fallback'; reason: FallbackReason };

export type RenderResult =
  | { path: 'raster'; rows: number; imageWidth: number; imageHeight: number }
  | { path: 'ascii'; rows: number; reason: FallbackReason };

export interface RenderInput {
  lines: readonly DisplayLine[];
  /** ASCII art for the chosen mascot size */
  art: readonly string[];
  options: Pick<FetchOptions, 'minimal' | 'art'>;
  theme: Theme;
  mode: ColorMode;
  size: TerminalSize;
}

export interface RenderDeps {
  terminal: Terminal;
  raster?: RasterSupport;
  logger?: Logger;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * "label: value", or the bare value when the label is empty.
 */
export function composeLine(line: DisplayLine): string {
  return line.label ? `${line.label}: ${line.value}` : line.value;
}

export function maxInfoWidth(lines: readonly DisplayLine[]): number {
  return lines.reduce((max, line) => Math.max(max, displayWidth(composeLine(line))), 0);
}

function fitToWidth(text: string, width: number): string {
  const chars = [...text];
  if (chars.length >= width) return chars.slice(0, width).join('');
  return text + ' '.repeat(width - chars.length);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// ASCII path
// ============================================================================

/**
 * One string per output row: art (padded to its widest row) + gap + text.
 * Without art only the text is printed.
 */
export function buildAsciiRows(input: Pick<RenderInput, 'lines' | 'art' | 'options' | 'theme' | 'mode'>): string[] {
  const art = input.options.art ? input.art : [];
  const width = input.options.art ? artWidth(art) : 0;
  const total = Math.max(art.length, input.lines.length);
  const rows: string[] = [];

  for (let i = 0; i < total; i++) {
    let row = '';
    if (input.options.art) {
      const artLine = fitToWidth(i < art.length ? art[i] : '', width);
      row += paint(artLine, input.theme.primary, input.mode) + ' '.repeat(COLUMN_GAP);
    }
    if (i < input.lines.length) {
      row += composeLine(input.lines[i]);
    }
    rows.push(row);
  }
  return rows;
}

function renderAscii(input: RenderInput, terminal: Terminal): number {
  const rows = buildAsciiRows(input);
  const commands: TerminalCommand[] = [];
  for (const row of rows) {
    if (row) commands.push({ type: 'write', text: row });
    commands.push({ type: 'newline' });
  }
  terminal.execute(commands);
  return rows.length;
}

// ============================================================================
// Raster path
// ============================================================================

/**
 * Commands that print the image, return to its top-left corner and overlay
 * the text column to its right.
 */
export function buildRasterCommands(
  payload: string,
  imageWidth: number,
  imageHeight: number,
  texts: readonly string[],
  columns: number
): TerminalCommand[] {
  const rows = Math.max(imageHeight, texts.length);
  const textColumn = Math.min(imageWidth + COLUMN_GAP, columns);
  const commands: TerminalCommand[] = [{ type: 'write', text: payload }];

  // Leave the cursor on a fresh row below everything we are about to occupy,
  // scrolling if needed, then climb back to the anchor row.
  for (let i = 0; i < rows - imageHeight + 1; i++) {
    commands.push({ type: 'newline' });
  }
  commands.push({ type: 'cursorUp', rows }, { type: 'cursorToColumn', column: 0 }, { type: 'saveCursor' });

  texts.forEach((text, i) => {
    commands.push(
      { type: 'restoreCursor' },
      { type: 'cursorDown', rows: i },
      { type: 'cursorToColumn', column: textColumn },
      { type: 'write', text }
    );
  });

  commands.push(
    { type: 'restoreCursor' },
    { type: 'cursorDown', rows },
    { type: 'cursorToColumn', column: 0 },
    { type: 'newline' }
  );
  return commands;
}

/**
 * Try to print the mascot as an image with the text beside it. Every failure
 * before output starts comes back as a fallback reason.
 */
export async function attemptRaster(input: RenderInput, deps: RenderDeps): Promise<RasterAttempt> {
  const logger = deps.logger ?? silentLogger;
  const raster = deps.raster;
  if (!raster) return { kind: 'fallback', reason: 'no-raster-support' };

  const available = input.size.columns - (maxInfoWidth(input.lines) + COLUMN_GAP);
  if (available < MIN_IMAGE_WIDTH) {
    return { kind: 'fallback', reason: 'too-narrow' };
  }
  const targetWidth = clamp(available, MIN_IMAGE_WIDTH, MAX_IMAGE_WIDTH);

  let image: RasterImage;
  try {
    image = raster.rasterizer.rasterize(raster.loadSvg(), targetWidth * PIXELS_PER_CELL);
  } catch (error) {
    logger(`[render] Could not rasterize mascot: ${describe(error)}`);
    return { kind: 'fallback', reason: 'decode-failed' };
  }

  let encoded: EncodedImage | null;
  try {
    encoded = await raster.encoder.encode(image, targetWidth);
  } catch (error) {
    logger(`[render] Could not encode mascot image: ${describe(error)}`);
    return { kind: 'fallback', reason: 'encode-failed' };
  }
  if (!encoded) {
    return { kind: 'fallback', reason: 'unsupported' };
  }

  const texts = input.lines.map(composeLine);
  // The anchor row has to stay on screen for the cursor to climb back to it
  const rows = Math.max(encoded.height, texts.length);
  if (rows >= input.size.rows) {
    return { kind: 'fallback', reason: 'too-short' };
  }
  deps.terminal.execute(buildRasterCommands(encoded.payload, encoded.width, encoded.height, texts, input.size.columns));

  return {
    kind: 'rendered',
    rows,
    imageWidth: encoded.width,
    imageHeight: encoded.height,
  };
}

function skipReason(options: RenderInput['options']): FallbackReason | null {
  if (!options.art) return 'art-disabled';
  if (options.minimal) return 'minimal';
  return null;
}

// ============================================================================
// Entry
// ============================================================================

export async function renderFetch(input: RenderInput, deps: RenderDeps): Promise<RenderResult> {
  const logger = deps.logger ?? silentLogger;

  const skipped = skipReason(input.options);
  const attempt: RasterAttempt = skipped
    ? { kind: 'fallback', reason: skipped }
    : await attemptRaster(input, deps);

  switch (attempt.kind) {
    case 'rendered':
      logger(`[render] Printed ${attempt.imageWidth}x${attempt.imageHeight} cell image`);
      return { path: 'raster', rows: attempt.rows, imageWidth: attempt.imageWidth, imageHeight: attempt.imageHeight };
    case 'fallback': {
      logger(`[render] Using ASCII art (${attempt.reason})`);
      const rows = renderAscii(input, deps.terminal);
      return { path: 'ascii', rows, reason: attempt.reason };
    }
  }
}
