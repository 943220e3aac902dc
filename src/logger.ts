import { getConfig, LogLevel, LOG_LEVELS } from './config.js';

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(getConfig().logLevel);
}

/**
 * Prefixed logger. All output goes to stderr so stdout stays reserved
 * for structured command output.
 */
export const logger = {
  error: (message: string) => {
    if (enabled('error')) console.error(`[ERROR] ${message}`);
  },
  warn: (message: string) => {
    if (enabled('warn')) console.error(`[WARN] ${message}`);
  },
  info: (message: string) => {
    if (enabled('info')) console.error(`[INFO] ${message}`);
  },
  debug: (message: string) => {
    if (enabled('debug')) console.error(`[DEBUG] ${message}`);
  },
};
