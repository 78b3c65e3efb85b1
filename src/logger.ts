import chalk from 'chalk';
import { ENV_LOG_LEVEL } from './config';

// Diagnostics go to stderr so stdout stays clean for piping.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function threshold(): number {
  const raw = process.env[ENV_LOG_LEVEL];
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return LEVEL_ORDER[raw];
  }
  return LEVEL_ORDER.info;
}

function write(level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < threshold()) return;

  switch (level) {
    case 'debug':
      process.stderr.write(chalk.dim(`debug: ${message}\n`));
      break;
    case 'info':
      process.stderr.write(`${message}\n`);
      break;
    case 'warn':
      process.stderr.write(chalk.yellow(`⚠  Warning: ${message}\n`));
      break;
    case 'error':
      process.stderr.write(chalk.red(`Error: ${message}\n`));
      break;
  }
}

export const logger = {
  debug: (message: string) => write('debug', message),
  info: (message: string) => write('info', message),
  warn: (message: string) => write('warn', message),
  error: (message: string) => write('error', message),
};

export type Logger = typeof logger;
