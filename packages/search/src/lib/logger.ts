/**
 * JSON-lines logger. One object per line: `ts`, `level`, `ns`, `msg`, any
 * bound fields, then `data`. `error` goes to stderr, the rest to stdout.
 *
 * The threshold comes from `LOG_LEVEL` (read per call, default `info`)
 * unless a logger is created with its own `level`.
 */

export const LOG_LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LOG_LEVELS;

export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  /** Fixed threshold; ignores `LOG_LEVEL` */
  level?: LogLevel;
  /** Merged into every entry. Reserved keys (`ts`, `level`, `ns`, `msg`, `data`) are ignored. */
  fields?: LogFields;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
  /** Same namespace and threshold, with `fields` added to the bound ones. */
  child(fields: LogFields): Logger;
  isEnabled(level: LogLevel): boolean;
}

const RESERVED = new Set(['ts', 'level', 'ns', 'msg', 'data']);

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function envLevel(): LogLevel {
  const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

/** Errors serialize to `{}` by default; keep their name, message and error code. */
function replaceErrors(_key: string, value: unknown): unknown {
  if (!(value instanceof Error)) return value;
  const out: LogFields = { name: value.name, message: value.message };
  if ('code' in value && value.code !== undefined) out.code = value.code;
  return out;
}

export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const bound: LogFields = {};
  for (const [key, value] of Object.entries(options.fields ?? {})) {
    if (!RESERVED.has(key)) bound[key] = value;
  }

  const isEnabled = (level: LogLevel) => LOG_LEVELS[level] >= LOG_LEVELS[options.level ?? envLevel()];

  const emit = (level: LogLevel, msg: string, data: unknown) => {
    if (!isEnabled(level)) return;
    const entry: LogFields = { ts: new Date().toISOString(), level, ns: namespace, msg, ...bound };
    if (data !== undefined) entry.data = data;
    const line = `${JSON.stringify(entry, replaceErrors)}\n`;
    if (level === 'error') process.stderr.write(line);
    else process.stdout.write(line);
  };

  return {
    debug: (msg, data?) => emit('debug', msg, data),
    info: (msg, data?) => emit('info', msg, data),
    warn: (msg, data?) => emit('warn', msg, data),
    error: (msg, data?) => emit('error', msg, data),
    child: (fields) => createLogger(namespace, { level: options.level, fields: { ...bound, ...fields } }),
    isEnabled,
  };
}
