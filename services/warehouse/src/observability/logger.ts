import pino, { stdTimeFunctions, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { loadServiceConfig } from '../config/serviceConfig';

export type { Logger };

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

let rootLogger: Logger | null = null;

export function createLogger(level: string, destination?: DestinationStream): Logger {
  return destination ? pino(createLoggerOptions(level), destination) : pino(createLoggerOptions(level));
}

/** Logs to stderr so command output on stdout stays machine readable. */
export function createStderrLogger(level: string): Logger {
  return createLogger(level, pino.destination(2));
}

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger(loadServiceConfig().logLevel);
  }
  return rootLogger;
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
