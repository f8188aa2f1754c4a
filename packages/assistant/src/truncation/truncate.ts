import type { ToolName } from '../types/index.js';

/** `head_tail` keeps both ends of the text, `head` keeps only the start. */
export type TruncationMode = 'head_tail' | 'head';

export type TruncationLimits = {
  readonly maxChars: number;
  readonly maxLines?: number | null;
};

export const TRUNCATION_MODES: Readonly<Record<ToolName, TruncationMode>> = {
  // errors tend to sit at the end of command output
  shell: 'head_tail',
  // search results are ranked
  search: 'head',
};

export const DEFAULT_LINE_LIMITS: Readonly<Record<ToolName, number | null>> = {
  shell: 256,
  search: null,
};

/**
 * Character-based truncation. Returns the input unchanged when it fits;
 * otherwise the kept text plus a bracketed marker saying how much was cut.
 */
export function truncateChars(output: string, maxChars: number, mode: TruncationMode): string {
  if (output.length <= maxChars) {
    return output;
  }

  const removed = output.length - maxChars;

  if (mode === 'head_tail') {
    const half = Math.floor(maxChars / 2);
    const head = output.slice(0, half);
    const tail = output.slice(output.length - half);
    return `${head}\n\n[... ${removed} characters omitted ...]\n\n${tail}`;
  }

  return `${output.slice(0, maxChars)}\n\n[... ${removed} characters omitted ...]`;
}

/** Keeps `maxLines` lines split between the start and the end; an odd line goes to the start. */
export function truncateLines(output: string, maxLines: number): string {
  const lines = output.split('\n');

  if (lines.length <= maxLines) {
    return output;
  }

  const headCount = Math.ceil(maxLines / 2);
  const tailCount = maxLines - headCount;

  const head = lines.slice(0, headCount);
  const tail = lines.slice(lines.length - tailCount);
  const removed = lines.length - head.length - tail.length;

  return `${head.join('\n')}\n[... ${removed} lines omitted ...]\n${tail.join('\n')}`;
}

/**
 * Bounds tool output before it is folded into the conversation: characters
 * first, then lines where the tool has a line limit.
 */
export function truncateToolOutput(output: string, tool: ToolName, limits: TruncationLimits): string {
  let result = truncateChars(output, limits.maxChars, TRUNCATION_MODES[tool]);

  const lineLimit = limits.maxLines === undefined ? DEFAULT_LINE_LIMITS[tool] : limits.maxLines;
  if (lineLimit !== null) {
    result = truncateLines(result, lineLimit);
  }

  return result;
}
