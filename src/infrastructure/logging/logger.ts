import pino from 'pino';
import type { Logger, Level } from 'pino';

const LEVELS: readonly Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function isLevel(value: string | undefined): value is Level {
  return LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  level?: Level | undefined;
  /** Append-only operational log alongside stdout. Omit for stdout only. */
  logFile?: string | undefined;
}

/**
 * Process logger: JSON lines to stdout and, when `logFile` is set, to an
 * append-only file. A valid `LOG_LEVEL` wins over the requested level.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env['LOG_LEVEL'];
  const level: Level = isLevel(envLevel) ? envLevel : options.level ?? 'info';

  if (options.logFile === undefined) {
    return pino({ level, name: 'telemetry-pipe' });
  }

  return pino(
    { level, name: 'telemetry-pipe' },
    pino.multistream([
      { level, stream: pino.destination(1) },
      {
        level,
        stream: pino.destination({ dest: options.logFile, append: true, mkdir: true, sync: false }),
      },
    ]),
  );
}
