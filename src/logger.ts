/**
 * Structured logger
 *
 * JSON lines on stderr. stdout belongs to the language server protocol stream,
 * so nothing is ever written there.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown> & {
  component?: string;
  uri?: string;
};

export interface Logger {
  child: (meta: LogMeta) => Logger;
  debug: (meta: LogMeta, msg: string) => void;
  info: (meta: LogMeta, msg: string) => void;
  warn: (meta: LogMeta, msg: string) => void;
  error: (meta: LogMeta, msg: string) => void;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

function safeJson(obj: unknown): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return JSON.stringify({ msg: '[unserializable]' });
  }
}

function errorDetails(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

const writeStderr: LogSink = line => {
  process.stderr.write(line);
};

export function createLogger(baseMeta: LogMeta = {}, options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const sink = options.sink ?? writeStderr;

  const log = (level: LogLevel, meta: LogMeta, msg: string) => {
    if (LOG_LEVELS[level] < minLevel) return;

    const record: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...baseMeta,
    };
    for (const [key, value] of Object.entries(meta)) {
      record[key] = errorDetails(value);
    }

    sink(safeJson(record) + '\n');
  };

  return {
    child: (meta: LogMeta) => createLogger({ ...baseMeta, ...meta }, options),
    debug: (meta: LogMeta, msg: string) => log('debug', meta, msg),
    info: (meta: LogMeta, msg: string) => log('info', meta, msg),
    warn: (meta: LogMeta, msg: string) => log('warn', meta, msg),
    error: (meta: LogMeta, msg: string) => log('error', meta, msg),
  };
}

export const silentLogger: Logger = createLogger({}, { sink: () => undefined });
