import type { TransformableInfo } from 'logform';
import type { Logger } from 'winston';
import { createLogger, format, transports } from 'winston';

export const LOG_LEVELS = [ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ] as const;

/**
 * Different log levels, from most important to least important.
 */
export type LogLevel = typeof LOG_LEVELS[number];

let logLevel: LogLevel = 'info';

// Labelled loggers are children of this one and share its level, every level is written to stderr
const root = createLogger({
  level: logLevel,
  format: format.combine(
    format.colorize(),
    format.printf(({ level, message, label }: TransformableInfo): string =>
      `[${String(label)}] ${level}: ${String(message)}`),
  ),
  transports: [ new transports.Console({ stderrLevels: [ ...LOG_LEVELS ]}) ],
});

export function getLogLevel(): LogLevel {
  return logLevel;
}

export function setLogLevel(level: LogLevel): void {
  logLevel = level;
  root.level = level;
}

export function getLogger(label: string): Logger {
  return root.child({ label });
}
