/**
 * Logger Module
 *
 * winston logger built from the validated configuration on first use. The
 * console transport writes to stderr only: stdout is reserved for the HTML
 * the CLI produces. Log files are written only when LOG_DIR is set.
 */

import winston from 'winston';
import chalk from 'chalk';
import path from 'path';
import { getConfig } from './config';
import type { EnvConfig } from './config';

const LEVEL_LABELS: Record<string, string> = {
  error: chalk.red.bold('ERROR'),
  warn: chalk.yellow.bold('WARN'),
  info: chalk.blue('INFO'),
  verbose: chalk.cyan('VERBOSE'),
  debug: chalk.gray('DEBUG'),
};

/**
 * `[time] LEVEL [category] message {meta}`
 */
const consoleFormat = winston.format.printf(({ level, message, timestamp, category, ...meta }) => {
  const time = chalk.dim(`[${new Date(String(timestamp)).toLocaleTimeString()}]`);
  const label = LEVEL_LABELS[level] ?? level.toUpperCase();
  const tag = typeof category === 'string' ? chalk.magenta(`[${category}] `) : '';
  const extra = Object.keys(meta).length > 0 ? chalk.dim(` ${JSON.stringify(meta)}`) : '';

  return `${time} ${label} ${tag}${String(message)}${extra}`;
});

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json()
);

const fileTransport = (dir: string, filename: string, level: string) =>
  new winston.transports.File({
    filename: path.join(dir, filename),
    level,
    format: fileFormat,
    maxsize: 5 * 1024 * 1024, // 5MB
    maxFiles: 3,
  });

const buildLogger = (config: EnvConfig): winston.Logger => {
  const level = config.LOG_LEVEL;
  const transports: winston.transport[] = [];

  if (config.LOG_DIR) {
    transports.push(
      fileTransport(config.LOG_DIR, 'html-deltags.log', level),
      fileTransport(config.LOG_DIR, 'html-deltags-error.log', 'error')
    );
  }

  if (config.LOG_TO_CONSOLE) {
    transports.push(
      new winston.transports.Console({
        level,
        stderrLevels: Object.keys(LEVEL_LABELS),
        format: winston.format.combine(winston.format.timestamp(), consoleFormat),
      })
    );
  }

  return winston.createLogger({
    level,
    transports,
    silent: transports.length === 0,
    exitOnError: false,
  });
};

let root: winston.Logger | undefined;

/**
 * The process-wide logger. Throws ConfigError when the environment is invalid.
 */
export const getLogger = (): winston.Logger => {
  if (!root) {
    root = buildLogger(getConfig());
  }
  return root;
};

export type LogCategory = 'core' | 'parser' | 'cli' | 'io';

export interface CategoryLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
}

const categoryLogger = (category: LogCategory): CategoryLogger => ({
  debug: (message, meta) => {
    getLogger().debug(message, { category, ...meta });
  },
  info: (message, meta) => {
    getLogger().info(message, { category, ...meta });
  },
});

export const coreLogger = categoryLogger('core');
export const parserLogger = categoryLogger('parser');
export const cliLogger = categoryLogger('cli');
export const ioLogger = categoryLogger('io');
