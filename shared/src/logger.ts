/* Structured JSON line logger */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(v: string): v is LogLevel {
  return v in levelOrder;
}

const rawLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
const envLevel: LogLevel = isLogLevel(rawLevel) ? rawLevel : 'info';

export interface Logger {
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

function createLogger(bindings: LogMeta): Logger {
  const self: Logger = {
    log(level, msg, meta = {}) {
      if (levelOrder[level] < levelOrder[envLevel]) return;
      const line = {
        ts: new Date().toISOString(),
        level,
        msg,
        ...bindings,
        ...meta,
      };
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(line));
    },
    debug: (msg, meta) => self.log('debug', msg, meta),
    info: (msg, meta) => self.log('info', msg, meta),
    warn: (msg, meta) => self.log('warn', msg, meta),
    error: (msg, meta) => self.log('error', msg, meta),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
  return self;
}

export const logger = createLogger({});

/** Flattens an unknown thrown value into loggable fields. */
export function errorMeta(err: unknown): LogMeta {
  if (err instanceof Error) return { err: err.message, name: err.name, stack: err.stack };
  return { err: String(err) };
}
