/**
 * 终端日志输出
 */

import chalk from 'chalk';
import { Logger } from './types.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

const levelPrefixes: Record<LogLevel, string> = {
  debug: '○',
  info: '●',
  warn: '▲',
  error: '✗',
  success: '✔',
};

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    info(message: string) {
      console.log(chalk.blue(`${levelPrefixes.info} ${message}`));
    },
    warn(message: string) {
      console.warn(chalk.yellow(`${levelPrefixes.warn} ${message}`));
    },
    error(message: string) {
      console.error(chalk.red(`${levelPrefixes.error} ${message}`));
    },
    success(message: string) {
      console.log(chalk.green(`${levelPrefixes.success} ${message}`));
    },
    debug(message: string) {
      if (options.verbose) {
        console.log(chalk.gray(`${levelPrefixes.debug} ${message}`));
      }
    },
  };
}
