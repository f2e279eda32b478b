import { appendFileSync } from 'node:fs';
import chalk from 'chalk';
import { DEBUG_ENV_VAR } from '../constants.js';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  dim(message: string): void;
}

let logFilePath: string | undefined;
let verbose = process.env[DEBUG_ENV_VAR] === '1';

/**
 * Mirror every log line, timestamped, into `path`.
 */
export function setLogFile(path: string | undefined): void {
  logFilePath = path;
}

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

function record(level: string, message: string): void {
  if (!logFilePath) return;
  try {
    appendFileSync(logFilePath, `${timestamp()} - ${level}: ${message}\n`, 'utf-8');
  } catch (err) {
    const path = logFilePath;
    logFilePath = undefined;
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(chalk.yellow(`⚠ Cannot write log file ${path}, file logging disabled: ${reason}`));
  }
}

export const logger: Logger = {
  info(message) {
    console.log(chalk.blue('ℹ ') + message);
    record('INFO', message);
  },
  success(message) {
    console.log(chalk.green(`✓ ${message}`));
    record('SUCCESS', message);
  },
  warn(message) {
    console.warn(chalk.yellow(`⚠ ${message}`));
    record('WARNING', message);
  },
  error(message) {
    console.error(chalk.red(`ERROR: ${message}`));
    record('ERROR', message);
  },
  debug(message) {
    record('DEBUG', message);
    if (verbose) console.log(chalk.gray(message));
  },
  dim(message) {
    console.log(chalk.dim(message));
  },
};
