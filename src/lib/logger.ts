import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogData = Record<string, unknown>;

export interface Logger {
  level: LogLevel;
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

const shouldLog = (configLevel: LogLevel, entryLevel: LogLevel): boolean =>
  LEVEL_ORDER[entryLevel] >= LEVEL_ORDER[configLevel];

const formatData = (data?: LogData): string => {
  if (!data || Object.keys(data).length === 0) {
    return '';
  }
  return ' ' + chalk.gray(JSON.stringify(data));
};

export const createLogger = (level: LogLevel): Logger => {
  const write = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, data?: LogData): void => {
    if (!shouldLog(level, entryLevel)) {
      return;
    }
    const suffix = formatData(data);
    switch (entryLevel) {
      case 'debug':
        console.log(chalk.gray(`· ${message}`) + suffix);
        break;
      case 'info':
        console.log(message + suffix);
        break;
      case 'warn':
        console.warn(chalk.yellow(`⚠ ${message}`) + suffix);
        break;
      case 'error':
        console.error(chalk.red(`✗ ${message}`) + suffix);
        break;
    }
  };

  return {
    level,
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
};

export const silentLogger: Logger = createLogger('silent');
