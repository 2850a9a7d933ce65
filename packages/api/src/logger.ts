import { pino } from 'pino';
import type { DestinationStream, LevelWithSilent, Logger } from 'pino';

/** Root service logger. Writes JSON lines to stdout unless a destination is given. */
export function createLogger(level: LevelWithSilent, destination?: DestinationStream): Logger {
  const options = { name: 'mailsift', level };
  return destination ? pino(options, destination) : pino(options);
}

/** pino-http level for a finished response: server errors, client errors, the rest */
export function responseLogLevel(statusCode: number, err?: Error): LevelWithSilent {
  if (statusCode >= 500 || err) return 'error';
  if (statusCode >= 400) return 'warn';
  return 'info';
}
