import { describe, it, expect } from 'vitest';
import { truncateChars, truncateLines, truncateToolOutput } from './truncate.js';

describe('truncateChars', () => {
  it('returns the input unchanged when it fits', () => {
    expect(truncateChars('hello world', 100, 'head_tail')).toBe('hello world');
    expect(truncateChars('a'.repeat(100), 100, 'head_tail')).toBe('a'.repeat(100));
  });

  it('handles empty output', () => {
    expect(truncateChars('', 10, 'head')).toBe('');
  });

  it('keeps both ends in head_tail mode', () => {
    const input = `${'a'.repeat(50)}${'b'.repeat(50)}`;

    expect(truncateChars(input, 10, 'head_tail')).toBe('aaaaa\n\n[... 90 characters omitted ...]\n\nbbbbb');
  });

  it('keeps the start in head mode', () => {
    expect(truncateChars('0123456789', 4, 'head')).toBe('0123\n\n[... 6 characters omitted ...]');
  });
});

describe('truncateLines', () => {
  it('returns the input unchanged within the limit', () => {
    expect(truncateLines('a\nb\nc', 3)).toBe('a\nb\nc');
  });

  it('drops lines from the middle', () => {
    const input = ['1', '2', '3', '4', '5', '6'].join('\n');

    expect(truncateLines(input, 4)).toBe('1\n2\n[... 2 lines omitted ...]\n5\n6');
  });

  it('counts only the lines it actually drops for an odd limit', () => {
    const input = ['1', '2', '3', '4', '5', '6', '7'].join('\n');

    expect(truncateLines(input, 3)).toBe('1\n2\n[... 4 lines omitted ...]\n7');
  });
});

describe('truncateToolOutput', () => {
  it('applies the shell line limit after the character limit', () => {
    const input = Array.from({ length: 300 }, (_, i) => `line ${i}`).join('\n');
    const result = truncateToolOutput(input, 'shell', { maxChars: 100_000 });
    const lines = result.split('\n');

    expect(lines).toHaveLength(257);
    expect(lines[0]).toBe('line 0');
    expect(lines[128]).toBe('[... 44 lines omitted ...]');
    expect(lines[256]).toBe('line 299');
  });

  it('has no line limit for search results', () => {
    const input = Array.from({ length: 300 }, () => 'x').join('\n');

    expect(truncateToolOutput(input, 'search', { maxChars: 100_000 })).toBe(input);
  });

  it('lets the caller override the line limit', () => {
    expect(truncateToolOutput('a\nb\nc\nd', 'shell', { maxChars: 100, maxLines: null })).toBe('a\nb\nc\nd');
    expect(truncateToolOutput('a\nb\nc\nd', 'search', { maxChars: 100, maxLines: 2 })).toBe(
      'a\n[... 2 lines omitted ...]\nd',
    );
  });
});
