import path from 'node:path';
import pino from 'pino';
import pretty from 'pino-pretty';

export type ConsoleLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Level = 'debug' | 'info' | 'warn' | 'error';

export interface LogPaths {
  normal: string;
  debug: string;
}

export interface Logger {
  child(bindings?: Record<string, unknown>): Logger;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  getLogPaths(): LogPaths;
}

export interface LoggerOptions {
  /** Directory for `<name>.log` (info+) and `<name>.debug.log` (everything). */
  logDir: string;
  consoleLevel: ConsoleLevel;
}

function wrap(instance: pino.Logger, paths: LogPaths): Logger {
  const call = (lvl: Level, msg: string, meta?: Record<string, unknown>) => {
    instance[lvl](meta ?? {}, msg);
  };

  return {
    child: bindings => wrap(instance.child(bindings ?? {}), paths),
    debug: (m, meta) => call('debug', m, meta),
    info: (m, meta) => call('info', m, meta),
    warn: (m, meta) => call('warn', m, meta),
    error: (m, meta) => call('error', m, meta),
    getLogPaths: () => ({ ...paths }),
  };
}

/**
 * Creates a logger writing to the console and to two files under `logDir`:
 * a normal log (info and above) and a debug log (all levels).
 */
export function createLogger(name: string, options: LoggerOptions): Logger {
  const paths: LogPaths = {
    normal: path.join(options.logDir, `${name}.log`),
    debug: path.join(options.logDir, `${name}.debug.log`),
  };

  const streams: pino.StreamEntry[] = [
    {
      level: 'info',
      stream: pino.destination({ dest: paths.normal, mkdir: true, sync: true }),
    },
    {
      level: 'debug',
      stream: pino.destination({ dest: paths.debug, mkdir: true, sync: true }),
    },
  ];

  if (options.consoleLevel !== 'silent') {
    streams.push({
      level: options.consoleLevel,
      stream: pretty({
        colorize: true,
        singleLine: true,
        sync: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      }),
    });
  }

  const root = pino(
    {
      name,
      level: 'debug',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );

  return wrap(root, paths);
}

export function isConsoleLevel(value: string): value is ConsoleLevel {
  return ['debug', 'info', 'warn', 'error', 'silent'].includes(value);
}
