import { LOG_LEVELS, type LogLevel } from './config';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug: (msg: string, fields?: LogFields) => void;
  info: (msg: string, fields?: LogFields) => void;
  warn: (msg: string, fields?: LogFields) => void;
  error: (msg: string, fields?: LogFields) => void;
  child: (bindings: LogFields) => Logger;
}

const serializeError = (error: unknown): unknown => {
  if (error instanceof Error) {
    const cause: unknown = error.cause;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(cause !== undefined ? { cause: serializeError(cause) } : {})
    };
  }
  return error;
};

const normalizeFields = (fields: LogFields) =>
  Object.fromEntries(
    Object.entries(fields).map(([key, value]) => [key, value instanceof Error ? serializeError(value) : value])
  );

export const createLogger = (level: LogLevel, bindings: LogFields = {}): Logger => {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (lineLevel: LogLevel, msg: string, fields: LogFields = {}) => {
    if (LOG_LEVELS.indexOf(lineLevel) < threshold) {
      return;
    }
    const line = JSON.stringify({
      time: new Date().toISOString(),
      level: lineLevel,
      msg,
      ...bindings,
      ...normalizeFields(fields)
    });
    if (lineLevel === 'warn' || lineLevel === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (childBindings) => createLogger(level, { ...bindings, ...childBindings })
  };
};

/** Discards every line; handy for tests. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};
