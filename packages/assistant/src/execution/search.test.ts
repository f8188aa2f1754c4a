import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../config/index.js';
import type { ExecutionResult } from '../types/index.js';
import type { ProcessRunner } from './process-runner.js';
import { createSearchClient, formatSearchOutput, parseHits } from './search.js';

function result(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return { exitCode: 0, stdout: '', stderr: '', durationMs: 12, timedOut: false, truncated: false, ...overrides };
}

const hits = [
  { title: 'Arch Wiki: Pacman', abstract: 'Package manager guide', url: 'https://wiki.example.org/pacman' },
  { title: 'Second', abstract: 'Two', url: 'https://example.org/2' },
  { title: 'Third', abstract: 'Three', url: 'https://example.org/3' },
  { title: 'Fourth', abstract: 'Four', url: 'https://example.org/4' },
];

function fakeRunner(stdout: string) {
  return {
    runShell: vi.fn<ProcessRunner['runShell']>(),
    runArgv: vi.fn<ProcessRunner['runArgv']>().mockResolvedValue(result({ stdout })),
  } satisfies ProcessRunner;
}

describe('createSearchClient', () => {
  it('runs ddgr with the query as one argument', async () => {
    const runner = fakeRunner('[]');
    const client = createSearchClient(runner, DEFAULT_CONFIG.search);

    await client.search('pacman "mirror list"; rm -rf ~');

    expect(runner.runArgv).toHaveBeenCalledWith(
      'ddgr',
      ['--json', '-n', '5', '--unsafe', '--', 'pacman "mirror list"; rm -rf ~'],
      { timeoutMs: 30_000 },
    );
    expect(runner.runShell).not.toHaveBeenCalled();
  });

  it('keeps a query that starts with a dash out of the options', async () => {
    const runner = fakeRunner('[]');

    await createSearchClient(runner, DEFAULT_CONFIG.search).search('--proxy=http://127.0.0.1:8080 arch wiki');

    expect(runner.runArgv).toHaveBeenCalledWith(
      'ddgr',
      ['--json', '-n', '5', '--unsafe', '--', '--proxy=http://127.0.0.1:8080 arch wiki'],
      { timeoutMs: 30_000 },
    );
  });

  it('formats the first results as numbered snippets', async () => {
    const client = createSearchClient(fakeRunner(JSON.stringify(hits)), DEFAULT_CONFIG.search);

    const outcome = await client.search('pacman');

    expect(outcome.text).toBe(
      [
        '1. Arch Wiki: Pacman\n   Package manager guide\n   https://wiki.example.org/pacman',
        '2. Second\n   Two\n   https://example.org/2',
        '3. Third\n   Three\n   https://example.org/3',
      ].join('\n\n'),
    );
    expect(outcome.result.exitCode).toBe(0);
  });

  it('bounds the text to maxSearchChars', async () => {
    const client = createSearchClient(fakeRunner('x'.repeat(50)), { ...DEFAULT_CONFIG.search, maxSearchChars: 10 });

    const outcome = await client.search('anything');

    expect(outcome.text).toBe('xxxxxxxxxx...');
  });

  it('forwards the abort signal', async () => {
    const runner = fakeRunner('[]');
    const controller = new AbortController();

    await createSearchClient(runner, DEFAULT_CONFIG.search).search('q', { signal: controller.signal });

    expect(runner.runArgv).toHaveBeenCalledWith('ddgr', expect.any(Array), {
      timeoutMs: 30_000,
      signal: controller.signal,
    });
  });
});

describe('formatSearchOutput', () => {
  it('falls back to the raw output when it is not JSON', () => {
    expect(formatSearchOutput(result({ stdout: '  plain text results \n' }), 3)).toBe('plain text results');
  });

  it('reports an empty result list', () => {
    expect(formatSearchOutput(result({ stdout: '[]' }), 3)).toBe('No results found.');
  });

  it('reports a failed search with its stderr', () => {
    expect(formatSearchOutput(result({ exitCode: 1, stderr: 'no network\n' }), 3)).toBe(
      'Search failed (exit 1): no network',
    );
  });

  it('reports a timeout', () => {
    expect(formatSearchOutput(result({ timedOut: true, durationMs: 30_000 }), 3)).toBe(
      'Search timed out after 30000ms.',
    );
  });
});

describe('parseHits', () => {
  it('fills missing fields with empty strings and skips non-objects', () => {
    expect(parseHits('[{"title":"Only title"}, 3, null]')).toEqual([{ title: 'Only title', abstract: '', url: '' }]);
  });

  it('returns null for a JSON object', () => {
    expect(parseHits('{"title":"x"}')).toBeNull();
  });
});
