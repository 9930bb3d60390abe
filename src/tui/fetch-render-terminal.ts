/**
 * Fetch Render - Terminal
 *
 * Cursor movement and output are modelled as a list of commands executed by
 * a single writer. The render engine only ever builds command lists, which
 * keeps it testable against a recorder instead of a real terminal.
 */

import type { TerminalSize } from '../core/types.js';

export const DEFAULT_TERMINAL_SIZE: TerminalSize = { columns: 80, rows: 24 };

export type TerminalCommand =
  | { type: 'write'; text: string }
  | { type: 'newline' }
  | { type: 'cursorUp'; rows: number }
  | { type: 'cursorDown'; rows: number }
  /** 0-based */
  | { type: 'cursorToColumn'; column: number }
  | { type: 'saveCursor' }
  | { type: 'restoreCursor' };

export interface Terminal {
  size(): TerminalSize;
  execute(commands: readonly TerminalCommand[]): void;
}

/**
 * The slice of a tty.WriteStream we rely on. columns/rows are absent when
 * output is piped.
 */
export interface OutputStream {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
  isTTY?: boolean;
}

const CSI = '\x1b[';

export function serializeCommand(command: TerminalCommand): string {
  switch (command.type) {
    case 'write':
      return command.text;
    case 'newline':
      return '\n';
    case 'cursorUp':
      return command.rows > 0 ? `${CSI}${command.rows}A` : '';
    case 'cursorDown':
      return command.rows > 0 ? `${CSI}${command.rows}B` : '';
    case 'cursorToColumn':
      return `${CSI}${Math.max(0, command.column) + 1}G`;
    case 'saveCursor':
      return '\x1b7';
    case 'restoreCursor':
      return '\x1b8';
  }
}

export function serializeCommands(commands: readonly TerminalCommand[]): string {
  return commands.map(serializeCommand).join('');
}

function positive(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

export function terminalSize(stream: Pick<OutputStream, 'columns' | 'rows'>): TerminalSize {
  return {
    columns: positive(stream.columns, DEFAULT_TERMINAL_SIZE.columns),
    rows: positive(stream.rows, DEFAULT_TERMINAL_SIZE.rows),
  };
}

/**
 * Terminal backed by a writable stream, normally process.stdout.
 */
export class StreamTerminal implements Terminal {
  constructor(private readonly stream: OutputStream) {}

  size(): TerminalSize {
    return terminalSize(this.stream);
  }

  execute(commands: readonly TerminalCommand[]): void {
    const output = serializeCommands(commands);
    if (output) {
      this.stream.write(output);
    }
  }
}
