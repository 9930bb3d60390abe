/**
 * ANSI color utilities for CLI output
 *
 * Nothing here consults global state: every helper that can emit an escape
 * sequence takes an explicit ColorMode.
 */

export type ColorMode = 'ansi' | 'none';

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  brightBlack: '\x1b[90m',
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightWhite: '\x1b[97m',
};

/**
 * 24-bit foreground color sequence.
 */
export function rgb(r: number, g: number, b: number): string {
  return `\x1b[38;2;${r};${g};${b}m`;
}

export interface PaintStyle {
  bold?: boolean;
}

/**
 * Wrap text in a color sequence, or return it untouched when colors are off.
 */
export function paint(text: string, color: string, mode: ColorMode, style: PaintStyle = {}): string {
  if (mode === 'none') return text;
  const prefix = style.bold ? `${colors.bold}${color}` : color;
  return `${prefix}${text}${colors.reset}`;
}

export function colorModeFor(enabled: boolean): ColorMode {
  return enabled ? 'ansi' : 'none';
}

/**
 * The two rows of terminal palette swatches.
 */
export function paletteRows(mode: ColorMode): string[] {
  if (mode === 'none') return [];
  const normal = [colors.black, colors.red, colors.green, colors.yellow, colors.blue, colors.magenta, colors.cyan, colors.white];
  const bright = [
    colors.brightBlack,
    colors.brightRed,
    colors.brightGreen,
    colors.brightYellow,
    colors.brightBlue,
    colors.brightMagenta,
    colors.brightCyan,
    colors.brightWhite,
  ];
  const swatch = (color: string) => paint('███', color, mode);
  return [normal.map(swatch).join(''), bright.map(swatch).join('')];
}
