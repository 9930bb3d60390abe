/**
 * crabfetch - Core Types
 */

// ============================================================================
// Host facts
// ============================================================================

/**
 * One snapshot of the host, taken once per run.
 */
export interface SystemFacts {
  readonly hostname: string;
  readonly username: string;
  readonly osNameVersion: string;
  readonly kernelVersion: string;
  /** Whole seconds, never negative */
  readonly uptimeSeconds: number;
  readonly shellName: string;
  readonly cpuModel: string;
  /** At least 1 */
  readonly cpuCoreCount: number;
  readonly memoryUsedBytes: number;
  readonly memoryTotalBytes: number;
}

// ============================================================================
// Presentation
// ============================================================================

/**
 * Four color slots, each an ANSI SGR sequence.
 */
export interface Theme {
  readonly primary: string;
  readonly secondary: string;
  readonly accent: string;
  readonly info: string;
}

/**
 * A pre-colorized row of the info column. An empty label prints the value alone.
 */
export interface DisplayLine {
  readonly label: string;
  readonly value: string;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

/**
 * What the user asked for, after flags, env and config file are merged.
 */
export interface FetchOptions {
  theme: string;
  color: boolean;
  minimal: boolean;
  art: boolean;
  debug: boolean;
}
