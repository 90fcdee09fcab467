import chalk from 'chalk';
import type { LogLevel } from '../types/index.js';

// Log levels with their numerical values
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
}

export interface ConsoleLogger extends Logger {
  setLevel(level: LogLevel): void;
}

/**
 * Format the current timestamp
 */
function getTimestamp(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, -5);
}

/**
 * Create a console logger that drops messages below `level`
 */
export function createLogger(level: LogLevel = 'info'): ConsoleLogger {
  let threshold = LOG_LEVELS[level];

  const write = (min: number, tag: string, message: string): void => {
    if (threshold <= min) {
      console.log(`${chalk.gray(getTimestamp())} ${tag} ${message}`);
    }
  };

  return {
    setLevel(next: LogLevel): void {
      threshold = LOG_LEVELS[next];
    },
    debug: (message) => write(LOG_LEVELS.debug, chalk.blue('[DEBUG]'), message),
    info: (message) => write(LOG_LEVELS.info, chalk.green('[INFO]'), message),
    warn: (message) => write(LOG_LEVELS.warn, chalk.yellow('[WARN]'), message),
    error: (message) => write(LOG_LEVELS.error, chalk.red('[ERROR]'), message),
    // Success messages are user feedback and follow the info threshold
    success: (message) => write(LOG_LEVELS.info, chalk.greenBright('[SUCCESS]'), message),
  };
}

export default createLogger();
