// ---------------------------------------------------------------------------
// Structured logger
// ---------------------------------------------------------------------------
// One JSON line per entry: { ts, level, scope, msg, ...fields }.
// Written to stdout so any aggregator that reads JSON lines can pick it up.

import type { EngineConfig, LogLevel } from '@curvekit/config';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  readonly level: LogLevel;
  readonly scope: string;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  /** Logger with the same sink and level under `scope:child`. */
  child(scope: string): Logger;
  isEnabled(level: EntryLevel): boolean;
}

export interface LoggerOptions {
  level: LogLevel;
  scope: string;
  /** Line sink, defaults to stdout */
  write?: (line: string) => void;
  /** Clock, injectable for tests */
  now?: () => Date;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function writeStdout(line: string): void {
  process.stdout.write(line);
}

export function createLogger(options: LoggerOptions): Logger {
  const { level, scope } = options;
  const write = options.write ?? writeStdout;
  const now = options.now ?? (() => new Date());

  const isEnabled = (entryLevel: EntryLevel): boolean => LEVEL_RANK[entryLevel] >= LEVEL_RANK[level];

  const emit = (entryLevel: EntryLevel, msg: string, fields?: LogFields): void => {
    if (!isEnabled(entryLevel)) return;
    const entry = {
      ts: now().toISOString(),
      level: entryLevel,
      scope,
      msg,
      ...fields,
    };
    write(JSON.stringify(entry) + '\n');
  };

  return {
    level,
    scope,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (childScope) => createLogger({ ...options, scope: `${scope}:${childScope}` }),
    isEnabled,
  };
}

/** Logger configured from the engine config (level and scope). */
export function createLoggerFromConfig(
  config: Pick<EngineConfig, 'logLevel' | 'logScope'>,
  write?: (line: string) => void,
): Logger {
  return createLogger({ level: config.logLevel, scope: config.logScope, write });
}
