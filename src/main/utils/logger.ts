import log from 'electron-log/node';
import { LOG_LEVELS } from '@shared/constants';
import type { LogLevel } from '@shared/constants';

function consoleLevel(): LogLevel {
  const requested = process.env.TUNER_LOG_LEVEL;
  return Object.values(LOG_LEVELS).find(level => level === requested) ?? LOG_LEVELS.WARN;
}

class Logger {
  constructor() {
    log.transports.file.level = process.env.NODE_ENV === 'test' ? false : LOG_LEVELS.INFO;
    log.transports.console.level = consoleLevel();
  }

  error(message: string, ...args: unknown[]): void {
    log.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    log.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    log.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    log.debug(message, ...args);
  }
}

export const logger = new Logger();
