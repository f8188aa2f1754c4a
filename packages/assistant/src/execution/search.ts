import { isRecord, readString } from '@tuxmate/llm';
import type { AssistantConfig } from '../config/index.js';
import type { ExecutionResult } from '../types/index.js';
import type { ProcessRunner, RunOptions } from './process-runner.js';

export type SearchSettings = AssistantConfig['search'];

export type SearchHit = {
  readonly title: string;
  readonly abstract: string;
  readonly url: string;
};

export type SearchOutcome = {
  /** Text handed to the model: numbered snippets, or the raw output. */
  readonly text: string;
  readonly result: ExecutionResult;
};

export type SearchClient = {
  readonly search: (query: string, options?: RunOptions) => Promise<SearchOutcome>;
};

/**
 * Web search through the `ddgr` command-line client. The query is passed
 * as a single argv element after `--`, so a leading dash never reads as an option.
 */
export function createSearchClient(runner: ProcessRunner, settings: SearchSettings): SearchClient {
  return {
    async search(query, options = {}) {
      const args = ['--json', '-n', String(settings.maxResults), ...settings.extraArgs, '--', query];
      const result = await runner.runArgv(settings.binary, args, {
        timeoutMs: settings.timeoutMs,
        ...options,
      });
      return { text: bound(formatSearchOutput(result, settings.shownResults), settings.maxSearchChars), result };
    },
  };
}

export function formatSearchOutput(result: ExecutionResult, shownResults: number): string {
  if (result.timedOut) {
    return `Search timed out after ${result.durationMs}ms.`;
  }

  const hits = parseHits(result.stdout);
  if (hits === null) {
    const raw = result.stdout.trim();
    if (raw !== '') {
      return raw;
    }
    const detail = result.stderr.trim();
    return `Search failed (exit ${result.exitCode})${detail !== '' ? `: ${detail}` : '.'}`;
  }

  if (hits.length === 0) {
    return 'No results found.';
  }

  return hits
    .slice(0, shownResults)
    .map((hit, idx) => `${idx + 1}. ${hit.title}\n   ${hit.abstract}\n   ${hit.url}`)
    .join('\n\n');
}

/** null when the output is not a JSON array of results. */
export function parseHits(stdout: string): ReadonlyArray<SearchHit> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) {
    return null;
  }

  return parsed.filter(isRecord).map((entry) => ({
    title: readString(entry, 'title') ?? '',
    abstract: readString(entry, 'abstract') ?? '',
    url: readString(entry, 'url') ?? '',
  }));
}

function bound(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars)}...`;
}
