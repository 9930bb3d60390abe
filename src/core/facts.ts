/**
 * crabfetch - Host Facts
 *
 * Collects the SystemFacts snapshot. Each fact is read on its own and falls
 * back to a placeholder when the host refuses to answer, so a single failing
 * query never takes the others down with it.
 */

import { readFileSync } from 'fs';
import { spawnSync } from 'child_process';
import os from 'os';
import { parse } from 'dotenv';

import type { SystemFacts } from './types.js';

export const UNKNOWN = 'Unknown';

// ============================================================================
// Host probe
// ============================================================================

/**
 * Raw host queries. Any of them may throw.
 */
export interface HostProbe {
  hostname(): string;
  username(): string;
  osName(): string;
  kernelVersion(): string;
  uptimeSeconds(): number;
  shellPath(): string | undefined;
  cpuModels(): string[];
  totalMemory(): number;
  freeMemory(): number;
}

/**
 * "NAME VERSION_ID" from an os-release file, e.g. "Ubuntu 22.04".
 */
export function parseOsRelease(content: string): string | undefined {
  const fields = parse(content);
  const name = fields.NAME || fields.ID;
  if (!name) return undefined;
  return [name, fields.VERSION_ID].filter(Boolean).join(' ');
}

function linuxOsName(): string {
  for (const file of ['/etc/os-release', '/usr/lib/os-release']) {
    try {
      const name = parseOsRelease(readFileSync(file, 'utf-8'));
      if (name) return name;
    } catch {
      continue;
    }
  }
  return `Linux ${os.release()}`;
}

function macOsName(): string {
  const result = spawnSync('sw_vers', ['-productVersion'], { encoding: 'utf-8' });
  const version = result.status === 0 ? result.stdout.trim() : '';
  return version ? `macOS ${version}` : 'macOS';
}

export const nodeHostProbe: HostProbe = {
  hostname: () => os.hostname(),
  username: () => os.userInfo().username,
  osName: () => {
    switch (process.platform) {
      case 'linux':
        return linuxOsName();
      case 'darwin':
        return macOsName();
      default:
        return os.version();
    }
  },
  kernelVersion: () => os.release(),
  uptimeSeconds: () => os.uptime(),
  shellPath: () => process.env.SHELL || process.env.COMSPEC,
  cpuModels: () => os.cpus().map((cpu) => cpu.model),
  totalMemory: () => os.totalmem(),
  freeMemory: () => os.freemem(),
};

// ============================================================================
// Collection
// ============================================================================

function attempt<T>(read: () => T, fallback: T): T {
  try {
    return read();
  } catch {
    return fallback;
  }
}

function nonEmpty(value: string | undefined): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : UNKNOWN;
}

/**
 * Last path segment of a shell path, on either separator: "/bin/zsh" -> "zsh".
 */
export function shellNameFromPath(shellPath: string | undefined): string {
  if (!shellPath) return UNKNOWN;
  const segments = shellPath.split(/[\\/]/);
  return nonEmpty(segments[segments.length - 1]);
}

function wholeNumber(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

export function collectSystemFacts(probe: HostProbe = nodeHostProbe): SystemFacts {
  const cpus = attempt(() => probe.cpuModels(), []);
  const total = wholeNumber(attempt(() => probe.totalMemory(), 0));
  const free = wholeNumber(attempt(() => probe.freeMemory(), total));

  return {
    hostname: nonEmpty(attempt(() => probe.hostname(), UNKNOWN)),
    username: nonEmpty(attempt(() => probe.username(), process.env.USER || process.env.USERNAME || UNKNOWN)),
    osNameVersion: nonEmpty(attempt(() => probe.osName(), UNKNOWN)),
    kernelVersion: nonEmpty(attempt(() => probe.kernelVersion(), UNKNOWN)),
    uptimeSeconds: wholeNumber(attempt(() => probe.uptimeSeconds(), 0)),
    shellName: attempt(() => shellNameFromPath(probe.shellPath()), UNKNOWN),
    cpuModel: nonEmpty(cpus[0]),
    cpuCoreCount: Math.max(1, cpus.length),
    memoryUsedBytes: Math.min(total, Math.max(0, total - free)),
    memoryTotalBytes: total,
  };
}
