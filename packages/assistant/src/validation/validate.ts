import type { ValidationVerdict } from '../types/index.js';
import {
  ACCOUNT_COMMANDS,
  BLOCK_DEVICE,
  COPYING_COMMANDS,
  CORE_SERVICES,
  CRITICAL_FILES,
  CRYPTSETUP_WIPING_ACTIONS,
  FILESYSTEM_WRECKERS,
  FIND_ACTIONS,
  FIND_EXEC_ACTIONS,
  PACKAGE_MUTATIONS,
  PACMAN_LIKE,
  PARTITIONERS,
  POWER_COMMANDS,
  POWER_SYSTEMCTL_VERBS,
  PRIVILEGED_PREFIXES,
  PROTECTED_ROOTS,
  READ_ONLY_COMMANDS,
  SERVICE_CONTROL_VERBS,
  SERVICE_DISABLING_VERBS,
  SHELLS,
  WRITING_COMMANDS,
} from './rules.js';
import { shellQuote } from './elevation.js';
import {
  baseName,
  commandSubstitutions,
  commandWords,
  redirectTargets,
  splitSegments,
  tokenize,
} from './shell-syntax.js';

type Finding = {
  readonly severity: 'blocked' | 'confirm';
  readonly reason: string;
};

// sh -c "sh -c '...'" nesting beyond this is blocked outright
const MAX_NESTING = 4;

const FORK_BOMB = /(\S+)\s*\(\)\s*\{\s*\1\s*\|\s*\1\s*&\s*\}/;

/**
 * Classifies a shell command. Pattern-based: it catches the common
 * destructive and privileged forms, it does not sandbox anything.
 */
export function validateCommand(command: string): ValidationVerdict {
  const findings = inspect(command, 0);

  const blocked = findings.find((f) => f.severity === 'blocked');
  if (blocked) {
    return { kind: 'blocked', reason: blocked.reason };
  }

  const confirm = findings.find((f) => f.severity === 'confirm');
  if (confirm) {
    return { kind: 'requires_confirmation', reason: confirm.reason };
  }

  return { kind: 'safe', advisory: isReadOnly(command) };
}

function inspect(command: string, depth: number): ReadonlyArray<Finding> {
  if (depth > MAX_NESTING) {
    return [{ severity: 'blocked', reason: 'nests shell invocations too deeply to inspect' }];
  }

  const findings: Finding[] = [];

  if (FORK_BOMB.test(command)) {
    findings.push({ severity: 'blocked', reason: 'fork bomb' });
  }

  const segments = splitSegments(command);
  segments.forEach((segment, idx) => {
    if (segment.text.trim() === '') {
      return;
    }

    const tokens = tokenize(segment.text);
    const targets = redirectTargets(segment.text);
    const { words, elevatedBy } = commandWords(tokens);
    const base = baseName(words[0] ?? '');

    const blockReason = blockedReason(base, words, targets);
    if (blockReason) {
      findings.push({ severity: 'blocked', reason: blockReason });
    }

    const nextSegment = segments[idx + 1];
    if ((base === 'curl' || base === 'wget') && segment.separator === '|' && nextSegment) {
      const receiver = baseName(commandWords(tokenize(nextSegment.text)).words[0] ?? '');
      if (SHELLS.has(receiver)) {
        findings.push({ severity: 'blocked', reason: `pipes a download straight into ${receiver}` });
      }
    }

    if (elevatedBy) {
      findings.push({ severity: 'confirm', reason: `runs with elevated privileges via ${elevatedBy}` });
    }
    const confirmReason = confirmationReason(base, words, targets);
    if (confirmReason) {
      findings.push({ severity: 'confirm', reason: confirmReason });
    }

    for (const inner of nestedCommands(base, words)) {
      findings.push(...inspect(inner, depth + 1));
    }
  });

  for (const body of commandSubstitutions(command)) {
    findings.push(...inspect(body, depth + 1));
  }

  return findings;
}

function blockedReason(base: string, words: ReadonlyArray<string>, targets: ReadonlyArray<string>): string | null {
  for (const target of targets) {
    if (BLOCK_DEVICE.test(target)) {
      return `writes directly to the block device ${target}`;
    }
    if (CRITICAL_FILES.has(target)) {
      return `overwrites ${target}`;
    }
  }

  const operands = operandsOf(words);
  const recursive = words.some((w) => w === '--recursive' || /^-[a-zA-Z]*[rR]/.test(w));

  switch (true) {
    case base === 'rm': {
      if (words.includes('--no-preserve-root')) {
        return 'deletes with --no-preserve-root';
      }
      const root = operands.map(normalizePath).find(isProtected);
      return recursive && root !== undefined ? `recursively deletes ${root}` : null;
    }
    case base === 'find': {
      const root = findStartPaths(words).map(normalizePath).find(isProtected);
      return words.includes('-delete') && root !== undefined ? `deletes everything under ${root} (find -delete)` : null;
    }
    case base === 'chmod' || base === 'chown' || base === 'chgrp': {
      const root = operands.map(normalizePath).find(isProtected);
      return recursive && root !== undefined ? `recursively changes ownership or mode of ${root}` : null;
    }
    case base === 'dd': {
      const output = words.find((w) => w.startsWith('of='))?.slice(3);
      return output !== undefined && BLOCK_DEVICE.test(output) ? `writes raw data to ${output}` : null;
    }
    case base === 'mkfs' || base.startsWith('mkfs.') || FILESYSTEM_WRECKERS.has(base):
      return `destroys a filesystem with ${base}`;
    case base === 'cryptsetup': {
      const action = operands.find((op) => CRYPTSETUP_WIPING_ACTIONS.has(op));
      return action !== undefined ? `destroys a filesystem with cryptsetup ${action}` : null;
    }
    case base === 'shred': {
      const device = operands.find((p) => BLOCK_DEVICE.test(p));
      return device !== undefined ? `shreds the block device ${device}` : null;
    }
    case PARTITIONERS.has(base):
      return words.includes('-l') || words.includes('--list') || words.includes('print')
        ? null
        : `edits the partition table with ${base}`;
    case POWER_COMMANDS.has(base):
      return `changes the power state with ${base}`;
    case base === 'init' || base === 'telinit':
      return operands.includes('0') || operands.includes('6') ? `changes the runlevel with ${base}` : null;
    case base === 'systemctl': {
      const [verb, ...units] = operands;
      if (verb !== undefined && POWER_SYSTEMCTL_VERBS.has(verb)) {
        return `changes the power state with systemctl ${verb}`;
      }
      const core = units.map((u) => u.replace(/\.service$/, '')).find((u) => CORE_SERVICES.has(u));
      return verb !== undefined && SERVICE_DISABLING_VERBS.has(verb) && core !== undefined
        ? `${verb}s the core service ${core}`
        : null;
    }
    case base === 'tee': {
      const file = operands.find((p) => CRITICAL_FILES.has(p));
      return file !== undefined ? `overwrites ${file}` : null;
    }
    case COPYING_COMMANDS.has(base) || base === 'mv': {
      const destination = operands[operands.length - 1];
      return destination !== undefined && CRITICAL_FILES.has(destination) ? `overwrites ${destination}` : null;
    }
    default:
      return null;
  }
}

function confirmationReason(base: string, words: ReadonlyArray<string>, targets: ReadonlyArray<string>): string | null {
  const operands = operandsOf(words);

  if (base === 'su') {
    return 'switches to another user';
  }

  if (PACMAN_LIKE.has(base)) {
    return pacmanReason(base, words);
  }

  const mutations = PACKAGE_MUTATIONS[base];
  const subcommand = operands[0];
  if (mutations && subcommand !== undefined && mutations.has(subcommand)) {
    return `changes installed packages (${base} ${subcommand})`;
  }

  if (base === 'systemctl' && !words.includes('--user')) {
    const verb = operands[0];
    if (verb !== undefined && SERVICE_CONTROL_VERBS.has(verb)) {
      return `controls a system service (systemctl ${verb})`;
    }
  }
  if (base === 'service' && ['start', 'stop', 'restart', 'reload'].includes(operands[1] ?? '')) {
    return `controls a system service (service ${operands[0] ?? ''} ${operands[1] ?? ''})`;
  }

  if (ACCOUNT_COMMANDS.has(base)) {
    return `manages user accounts (${base})`;
  }

  const privilegedTarget = targets.find(isPrivileged);
  if (privilegedTarget !== undefined) {
    return `writes to ${privilegedTarget}`;
  }
  if (base === 'find' && words.includes('-delete')) {
    const path = findStartPaths(words).find(isPrivileged);
    if (path !== undefined) {
      return `modifies ${path}`;
    }
  }
  if (base === 'tee' || WRITING_COMMANDS.has(base)) {
    const path = operands.find(isPrivileged);
    if (path !== undefined) {
      return `modifies ${path}`;
    }
  }
  if (COPYING_COMMANDS.has(base)) {
    const destination = operands[operands.length - 1];
    if (destination !== undefined && operands.length > 1 && isPrivileged(destination)) {
      return `writes to ${destination}`;
    }
  }

  return null;
}

function pacmanReason(base: string, words: ReadonlyArray<string>): string | null {
  if (words.length === 1 && base !== 'pacman') {
    return `upgrades the whole system (${base})`;
  }

  const op = words.slice(1).find((w) => /^-[A-Za-z]+$/.test(w) || w.startsWith('--'));
  if (op === undefined) {
    return null;
  }
  if (op === '--sync' || op === '--remove' || op === '--upgrade') {
    return `changes installed packages (${base} ${op})`;
  }
  if (op.startsWith('--')) {
    return null;
  }

  const letters = op.slice(1);
  if (letters.startsWith('R') || letters.startsWith('U')) {
    return `changes installed packages (${base} ${op})`;
  }
  if (letters.startsWith('S')) {
    // -Ss, -Si, -Sl, -Sg only query the sync databases
    const modifiers = letters.slice(1);
    const queryOnly = modifiers !== '' && /^[silgqp]+$/.test(modifiers);
    return queryOnly ? null : `changes installed packages (${base} ${op})`;
  }
  return null;
}

/** Command strings a segment runs on behalf of its own command. */
function nestedCommands(base: string, words: ReadonlyArray<string>): ReadonlyArray<string> {
  const flagIdx = words.indexOf('-c');
  if ((SHELLS.has(base) || base === 'su' || base === '-c') && flagIdx !== -1) {
    const inner = words[flagIdx + 1];
    return inner !== undefined ? [inner] : [];
  }
  if (base === 'eval' && words.length > 1) {
    return [words.slice(1).join(' ')];
  }
  if (base === 'find') {
    return findExecBodies(words);
  }
  if (base === 'xargs') {
    const start = words.findIndex((w, idx) => idx > 0 && !w.startsWith('-'));
    return start !== -1 ? [words.slice(start).join(' ')] : [];
  }
  return [];
}

/** Starting points of a find invocation; `.` when none is given. */
function findStartPaths(words: ReadonlyArray<string>): ReadonlyArray<string> {
  const rest = words.slice(1);
  let idx = 0;
  while (idx < rest.length && /^-(?:[HLP]|O\d|D)$/.test(rest[idx] ?? '')) {
    idx += rest[idx] === '-D' ? 2 : 1;
  }
  const paths: string[] = [];
  for (const word of rest.slice(idx)) {
    if (word.startsWith('-') || word === '(' || word === '!') {
      break;
    }
    paths.push(word);
  }
  return paths.length > 0 ? paths : ['.'];
}

/** The commands `-exec` and friends run, with `{}` replaced by each starting point. */
function findExecBodies(words: ReadonlyArray<string>): ReadonlyArray<string> {
  const starts = findStartPaths(words);
  const bodies: string[] = [];
  words.forEach((word, idx) => {
    if (!FIND_EXEC_ACTIONS.has(word)) {
      return;
    }
    const end = words.findIndex((w, j) => j > idx && (w === ';' || w === '+'));
    const body = words.slice(idx + 1, end === -1 ? undefined : end);
    for (const start of starts) {
      bodies.push(body.map((w) => shellQuote(w.split('{}').join(start))).join(' '));
    }
  });
  return bodies;
}

function operandsOf(words: ReadonlyArray<string>): ReadonlyArray<string> {
  return words.slice(1).filter((w) => !w.startsWith('-') || w === '-');
}

function normalizePath(path: string): string {
  const collapsed = path.replace(/\/{2,}/g, '/');
  return collapsed.length > 1 ? collapsed.replace(/\/+$/, '') || '/' : collapsed;
}

/** Roots, system directories, home directories, and anything that climbs out with `..`. */
function isProtected(path: string): boolean {
  return PROTECTED_ROOTS.has(path) || /^\/home\/[^/]+$/.test(path) || path === '..' || path.endsWith('/..');
}

function isPrivileged(path: string): boolean {
  const normalized = normalizePath(path);
  return PRIVILEGED_PREFIXES.some((prefix) => normalized === prefix || normalized.startsWith(`${prefix}/`));
}

function isReadOnly(command: string): boolean {
  const segments = splitSegments(command).filter((s) => s.text.trim() !== '');
  return (
    segments.length > 0 &&
    segments.every((segment) => {
      if (redirectTargets(segment.text).some((t) => t !== '/dev/null')) {
        return false;
      }
      const { words } = commandWords(tokenize(segment.text));
      const base = baseName(words[0] ?? '');
      if (base === 'find' && words.some((w) => FIND_ACTIONS.has(w))) {
        return false;
      }
      return READ_ONLY_COMMANDS.has(base);
    })
  );
}
