/**
 * Just enough shell syntax to inspect commands: quote-aware splitting on
 * control operators, word splitting, and redirection targets. It does not
 * expand variables or globs.
 */

export type Separator = ';' | '&&' | '||' | '|' | '&' | '\n' | '';

export type Segment = {
  readonly text: string;
  /** The operator that ended this segment; '' for the last one. */
  readonly separator: Separator;
};

export function splitSegments(command: string): ReadonlyArray<Segment> {
  const segments: Segment[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;

  const push = (separator: Separator) => {
    segments.push({ text: current, separator });
    current = '';
  };

  for (let i = 0; i < command.length; i++) {
    const ch = command.charAt(i);
    const next = command.charAt(i + 1);

    if (quote) {
      current += ch;
      if (ch === '\\' && quote === '"' && next !== '') {
        current += next;
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === '\\' && next !== '') {
      current += ch + next;
      i++;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
      continue;
    }

    if ((ch === '&' && next === '&') || (ch === '|' && next === '|')) {
      push(ch === '&' ? '&&' : '||');
      i++;
    } else if (ch === '|' && next === '&') {
      push('|');
      i++;
    } else if (ch === '&' && (current.endsWith('>') || next === '>')) {
      // part of a redirection such as 2>&1 or &>file
      current += ch;
    } else if (ch === ';' || ch === '|' || ch === '&' || ch === '\n') {
      push(ch);
    } else {
      current += ch;
    }
  }
  push('');

  return segments;
}

/** Inverse of splitSegments. */
export function joinSegments(segments: ReadonlyArray<Segment>): string {
  return segments.map((segment) => segment.text + segment.separator).join('');
}

const REDIRECTION = /(?:\d|&)?>{1,2}\|?\s*("[^"]*"|'[^']*'|[^\s;&|<>]+)/g;

/** Files written by `>` and `>>` redirections in a segment. */
export function redirectTargets(segment: string): ReadonlyArray<string> {
  return [...segment.matchAll(REDIRECTION)].map((match) => unquote(match[1] ?? ''));
}

export function stripRedirections(segment: string): string {
  return segment.replace(REDIRECTION, ' ');
}

/** Splits a segment into words, removing quotes and redirections. */
export function tokenize(segment: string): ReadonlyArray<string> {
  const words: string[] = [];
  const text = stripRedirections(segment);
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === '\\' && quote === '"' && i + 1 < text.length) {
        current += text.charAt(++i);
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (ch === '\\' && i + 1 < text.length) {
      current += text.charAt(++i);
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}

/** Bodies of $(...) and `...` substitutions, which run as commands of their own. */
export function commandSubstitutions(command: string): ReadonlyArray<string> {
  const bodies: string[] = [];
  for (const match of command.matchAll(/\$\(([^()]*)\)|`([^`]*)`/g)) {
    const body = match[1] ?? match[2];
    if (body !== undefined && body.trim() !== '') {
      bodies.push(body);
    }
  }
  return bodies;
}

export function unquote(word: string): string {
  if (word.length >= 2 && (word.startsWith('"') || word.startsWith("'")) && word.endsWith(word.charAt(0))) {
    return word.slice(1, -1);
  }
  return word;
}

export const ELEVATION_COMMANDS: ReadonlySet<string> = new Set(['sudo', 'doas', 'pkexec', 'run0', 'kdesu', 'kdesudo']);

const TRANSPARENT_PREFIXES: ReadonlySet<string> = new Set(['env', 'nohup', 'time', 'nice', 'ionice', 'command', 'exec', 'stdbuf']);

export type CommandWords = {
  /** Words of the command proper, after any wrapper and elevation prefix. */
  readonly words: ReadonlyArray<string>;
  readonly elevatedBy: string | null;
};

/**
 * Peels off wrappers that do not change what runs: environment assignments,
 * `env`, `nohup`, `nice` and the like, plus one elevation prefix with its flags.
 */
export function commandWords(tokens: ReadonlyArray<string>): CommandWords {
  let idx = 0;
  let elevatedBy: string | null = null;

  while (idx < tokens.length) {
    const word = tokens[idx] ?? '';
    const base = baseName(word);

    if (/^[A-Za-z_][A-Za-z0-9_]*=/.test(word)) {
      idx++;
    } else if (TRANSPARENT_PREFIXES.has(base)) {
      idx++;
      // nice -n 10, stdbuf -oL, ionice -c3
      while (idx < tokens.length && (tokens[idx] ?? '').startsWith('-')) {
        idx += takesValue(tokens[idx] ?? '') ? 2 : 1;
      }
    } else if (ELEVATION_COMMANDS.has(base) && elevatedBy === null) {
      elevatedBy = base;
      idx++;
      while (idx < tokens.length && (tokens[idx] ?? '').startsWith('-')) {
        const flag = tokens[idx] ?? '';
        if (flag === '-c' && (base === 'kdesu' || base === 'kdesudo')) {
          break;
        }
        idx += takesValue(flag) ? 2 : 1;
      }
    } else {
      break;
    }
  }

  return { words: tokens.slice(idx), elevatedBy };
}

// -u user, -g group, -n 10: flags whose value is the next word
function takesValue(flag: string): boolean {
  return /^-[ugnCcDhpo]$/.test(flag) && flag !== '-c';
}

export function baseName(word: string): string {
  const slash = word.lastIndexOf('/');
  return slash === -1 ? word : word.slice(slash + 1);
}
