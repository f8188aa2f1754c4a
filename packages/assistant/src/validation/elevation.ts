import type { ElevationTool } from '../config/index.js';
import { joinSegments, splitSegments, type Segment } from './shell-syntax.js';

const LEADING_SUDO = /^(\s*)sudo((?:\s+-[EHknS]+)*)(?:\s+-u\s+(\S+))?\s+/;

/**
 * Replaces a leading `sudo` in each segment with a graphical elevation tool,
 * since the assistant has no terminal for sudo to prompt on. With `kdesu`
 * the rest of the segment becomes one quoted `-c` argument.
 */
export function rewriteElevation(command: string, tool: ElevationTool): string {
  if (tool === 'sudo') {
    return command;
  }
  return joinSegments(splitSegments(command).map((segment) => rewriteSegment(segment, tool)));
}

function rewriteSegment(segment: Segment, tool: Exclude<ElevationTool, 'sudo'>): Segment {
  const match = LEADING_SUDO.exec(segment.text);
  if (!match) {
    return segment;
  }

  const indent = match[1] ?? '';
  const user = match[3];
  const rest = segment.text.slice(match[0].length);

  if (tool === 'pkexec') {
    const userFlag = user !== undefined ? `--user ${user} ` : '';
    return { ...segment, text: `${indent}pkexec ${userFlag}${rest}` };
  }

  const trailing = /\s*$/.exec(rest)?.[0] ?? '';
  const body = rest.slice(0, rest.length - trailing.length);
  const userFlag = user !== undefined ? `-u ${user} ` : '';
  return { ...segment, text: `${indent}kdesu ${userFlag}-c ${shellQuote(body)}${trailing}` };
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
