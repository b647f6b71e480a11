import { pino, type LevelWithSilent, type Logger } from 'pino';

export interface LoggerOptions {
  /** Default: `'fanout'`. */
  readonly name?: string;
  /** Default: `'silent'`. */
  readonly level?: LevelWithSilent;
}

/** Build the publisher's default logger. Silent unless a level is given. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'fanout',
    level: options.level ?? 'silent',
  });
}
