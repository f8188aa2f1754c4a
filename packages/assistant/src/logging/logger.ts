export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Readonly<Record<string, unknown>>;

/**
 * Structured logger threaded through the session. Events are short
 * snake_case names; everything variable goes into `fields`.
 */
export type Logger = {
  readonly debug: (event: string, fields?: LogFields) => void;
  readonly info: (event: string, fields?: LogFields) => void;
  readonly warn: (event: string, fields?: LogFields) => void;
  readonly error: (event: string, fields?: LogFields) => void;
};

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export type LogSink = (line: string, level: Exclude<LogLevel, 'silent'>) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * One JSON object per line on stderr, so stdout stays free for whatever
 * surface embeds the assistant.
 */
export function createConsoleLogger(
  level: LogLevel = 'info',
  sink: LogSink = stderrSink,
  now: () => Date = () => new Date(),
): Logger {
  const threshold = LEVEL_RANK[level];

  const write = (lvl: Exclude<LogLevel, 'silent'>) => (event: string, fields: LogFields = {}) => {
    if (LEVEL_RANK[lvl] < threshold) {
      return;
    }
    sink(JSON.stringify({ time: now().toISOString(), level: lvl, event, ...serializeFields(fields) }), lvl);
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Errors do not survive JSON.stringify; flatten them to name and message. */
function serializeFields(fields: LogFields): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}
