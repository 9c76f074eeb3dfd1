import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Meta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(msg: string, meta?: Meta): void;
  info(msg: string, meta?: Meta): void;
  warn(msg: string, meta?: Meta): void;
  error(msg: string, meta?: Meta): void;
  /** Logger that merges `bindings` into the meta of every line. */
  child(bindings: Meta): Logger;
}

function serializeMeta(meta: Meta): Meta {
  // Error instances stringify to {} otherwise
  return Object.fromEntries(
    Object.entries(meta).map(([k, v]) => [k, v instanceof Error ? `${v.name}: ${v.message}` : v]),
  );
}

function log(level: LogLevel, message: string, meta?: Meta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const fields = meta && Object.keys(meta).length > 0 ? serializeMeta(meta) : undefined;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...fields })
    : fields ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(fields)}`
             : `[${ts}] [${level.toUpperCase()}] ${message}`;
  level === 'error' ? process.stderr.write(out + '\n') : process.stdout.write(out + '\n');
}

function createLogger(bindings: Meta = {}): Logger {
  const merge = (meta?: Meta): Meta => ({ ...bindings, ...meta });
  return {
    debug: (msg, meta) => log('debug', msg, merge(meta)),
    info:  (msg, meta) => log('info',  msg, merge(meta)),
    warn:  (msg, meta) => log('warn',  msg, merge(meta)),
    error: (msg, meta) => log('error', msg, merge(meta)),
    child: (extra) => createLogger({ ...bindings, ...extra }),
  };
}

export const logger: Logger = createLogger();
