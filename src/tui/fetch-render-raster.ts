/**
 * Fetch Render - Raster
 *
 * SVG mascot -> PNG (resvg) -> inline terminal image (terminal-image).
 * The encoder answers null when the terminal advertises no way to show an
 * image, which the engine treats as a reason to fall back to ASCII art.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Resvg } from '@resvg/resvg-js';
import terminalImage from 'terminal-image';

import { displayWidth, stripAnsi } from '../core/format.js';
import type { Env } from '../core/config.js';

// ============================================================================
// Types
// ============================================================================

/** A rasterized image; width/height in pixels */
export interface RasterImage {
  png: Buffer;
  width: number;
  height: number;
}

/** Terminal-ready image; width/height in character cells */
export interface EncodedImage {
  payload: string;
  width: number;
  height: number;
}

export interface Rasterizer {
  rasterize(svg: string, widthPx: number): RasterImage;
}

export interface ImageEncoder {
  encode(image: RasterImage, widthCells: number): Promise<EncodedImage | null>;
}

/**
 * Everything the engine needs for the raster path.
 */
export interface RasterSupport {
  loadSvg(): string;
  rasterizer: Rasterizer;
  encoder: ImageEncoder;
}

// ============================================================================
// Mascot asset
// ============================================================================

export function getMascotSvgPath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  // src/tui/ and dist/tui/ are both two levels below the package root
  return path.resolve(here, '../../assets/crab.svg');
}

export function loadMascotSvg(): string {
  return readFileSync(getMascotSvgPath(), 'utf-8');
}

// ============================================================================
// Rasterizer
// ============================================================================

export class ResvgRasterizer implements Rasterizer {
  rasterize(svg: string, widthPx: number): RasterImage {
    const resvg = new Resvg(svg, {
      fitTo: { mode: 'width' as const, value: widthPx },
      font: { loadSystemFonts: false },
    });
    const rendered = resvg.render();
    return { png: rendered.asPng(), width: rendered.width, height: rendered.height };
  }
}

// ============================================================================
// Encoder
// ============================================================================

/**
 * True when stdout is a terminal that can show an image: kitty, iTerm2 and
 * WezTerm natively, anything else only with 24-bit color for block pixels.
 */
export function supportsInlineImages(stream: { isTTY?: boolean }, env: Env): boolean {
  if (!stream.isTTY) return false;
  if (env.TERM === 'dumb') return false;
  if (env.KITTY_WINDOW_ID || env.TERM === 'xterm-kitty') return true;
  if (env.TERM_PROGRAM === 'iTerm.app' || env.TERM_PROGRAM === 'WezTerm') return true;
  const colorterm = env.COLORTERM?.toLowerCase();
  return colorterm === 'truecolor' || colorterm === '24bit';
}

/**
 * Work out how many cells an encoded image occupies. Block-pixel output is
 * measured directly; a native escape sequence has no visible rows, so its
 * height is estimated from the pixel aspect ratio (cells are about twice as
 * tall as they are wide).
 */
export function measureImagePayload(payload: string, image: RasterImage, widthCells: number): EncodedImage {
  const trimmed = payload.replace(/\n+$/, '');
  const rows = trimmed ? stripAnsi(trimmed).split('\n') : [];
  const width = rows.reduce((max, row) => Math.max(max, displayWidth(row)), 0);

  if (trimmed.includes('\x1b]') || width === 0) {
    const aspect = image.width > 0 ? image.height / image.width : 1;
    return {
      payload: trimmed,
      width: widthCells,
      height: Math.max(1, Math.ceil((aspect * widthCells) / 2)),
    };
  }
  return { payload: trimmed, width, height: rows.length };
}

export class TerminalImageEncoder implements ImageEncoder {
  constructor(
    private readonly stream: { isTTY?: boolean },
    private readonly env: Env = process.env
  ) {}

  async encode(image: RasterImage, widthCells: number): Promise<EncodedImage | null> {
    if (!supportsInlineImages(this.stream, this.env)) {
      return null;
    }
    const payload = await terminalImage.buffer(image.png, {
      width: widthCells,
      preserveAspectRatio: true,
    });
    return measureImagePayload(payload, image, widthCells);
  }
}

export function createRasterSupport(stream: { isTTY?: boolean }, env: Env = process.env): RasterSupport {
  return {
    loadSvg: loadMascotSvg,
    rasterizer: new ResvgRasterizer(),
    encoder: new TerminalImageEncoder(stream, env),
  };
}
