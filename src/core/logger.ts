/**
 * crabfetch - Debug Logger
 *
 * Loggers are plain functions so callers can pass them around or swap in a
 * collector. Output goes to stderr and only when debugging is on, so stdout
 * carries nothing but the fetch display.
 */

export type Logger = (message: string) => void;

export const silentLogger: Logger = () => {};

export function createLogger(enabled: boolean, sink: Logger = (message) => console.error(message)): Logger {
  if (!enabled) return silentLogger;
  return (message: string) => sink(`[crabfetch] ${message}`);
}
