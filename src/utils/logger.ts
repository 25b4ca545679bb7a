import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// JSON.stringify turns an Error into {}; keep name, message and code instead.
function serialize(meta: LogMeta): LogMeta {
  return Object.fromEntries(
    Object.entries(meta).map(([key, value]) => {
      if (value instanceof Error) {
        const code = 'code' in value ? value.code : undefined;
        return [key, { name: value.name, message: value.message, ...(code !== undefined ? { code } : {}) }];
      }
      return [key, value];
    }),
  );
}

function log(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const fields = meta ? serialize(meta) : undefined;
  const label = scope ? `[${scope}] ` : '';
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, ...(scope ? { scope } : {}), message, ...fields })
    : fields ? `[${ts}] [${level.toUpperCase()}] ${label}${message} ${JSON.stringify(fields)}`
             : `[${ts}] [${level.toUpperCase()}] ${label}${message}`;
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

function createLogger(scope?: string): Logger {
  return {
    debug: (msg, meta) => log('debug', scope, msg, meta),
    info:  (msg, meta) => log('info',  scope, msg, meta),
    warn:  (msg, meta) => log('warn',  scope, msg, meta),
    error: (msg, meta) => log('error', scope, msg, meta),
    child: (sub) => createLogger(scope ? `${scope}:${sub}` : sub),
  };
}

export const logger = createLogger();
