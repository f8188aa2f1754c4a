import { readFile } from 'node:fs/promises';
import { platform, release } from 'node:os';

export type SystemInfo = {
  readonly platform: string;
  readonly osVersion: string;
  /** PRETTY_NAME from os-release, e.g. "Arch Linux". */
  readonly distribution: string | null;
  readonly desktop: string | null;
  readonly shell: string | null;
  readonly date: string;
};

export async function getSystemInfo(
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date(),
  osReleasePath: string = '/etc/os-release',
): Promise<SystemInfo> {
  return {
    platform: platform(),
    osVersion: release(),
    distribution: await readDistribution(osReleasePath),
    desktop: env['XDG_CURRENT_DESKTOP'] ?? env['DESKTOP_SESSION'] ?? null,
    shell: env['SHELL'] ?? null,
    date: now.toISOString().split('T')[0] ?? '',
  };
}

async function readDistribution(path: string): Promise<string | null> {
  try {
    return parseOsRelease(await readFile(path, 'utf-8'));
  } catch {
    return null;
  }
}

/** PRETTY_NAME, else NAME, from the KEY=value lines of os-release. */
export function parseOsRelease(text: string): string | null {
  const fields = new Map<string, string>();
  for (const line of text.split('\n')) {
    const match = /^([A-Z_]+)=(.*)$/.exec(line.trim());
    if (match?.[1] !== undefined && match[2] !== undefined) {
      fields.set(match[1], match[2].replace(/^(["'])(.*)\1$/, '$2'));
    }
  }
  return fields.get('PRETTY_NAME') ?? fields.get('NAME') ?? null;
}
