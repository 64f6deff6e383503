import pino from 'pino';

export type Logger = pino.Logger;

export interface CreateLoggerOptions {
  level?: pino.LevelWithSilent;
  /** `pretty` renders through pino-pretty; `json` writes one object per line */
  format?: 'json' | 'pretty';
  /** Value of the `name` field on every line */
  name?: string;
  /** 1 for stdout, 2 for stderr */
  destination?: 1 | 2;
}

/**
 * Process logger for the API and CLI entry points.
 *
 * The CLI logs to stderr so command output on stdout stays clean.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { level = 'info', format = 'json', name = 'alertline', destination = 1 } = options;

  if (format === 'pretty') {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination,
        },
      },
    });
  }

  return pino({ name, level }, pino.destination(destination));
}

/**
 * Logger used by library code when the caller passes none
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
