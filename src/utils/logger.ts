import chalk from 'chalk';
import { LogLevelName } from '../types';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function isLogLevelName(name: string): name is LogLevelName {
  return Object.hasOwn(LEVEL_NAMES, name);
}

export function parseLogLevel(name: string): LogLevel {
  const normalized = name.toLowerCase();
  if (!isLogLevelName(normalized)) {
    throw new Error(`Unknown log level: ${name}`);
  }
  return LEVEL_NAMES[normalized];
}

export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;
  private showTimestamps = false;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  setTimestamps(enabled: boolean): void {
    this.showTimestamps = enabled;
  }

  private prefix(icon: string): string {
    if (!this.showTimestamps) {
      return icon;
    }
    return `${chalk.dim(new Date().toISOString())} ${icon}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      console.log(chalk.gray(`${this.prefix(chalk.dim('●'))} ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(`${this.prefix(chalk.blue('ℹ'))} ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      console.log(`${this.prefix(chalk.yellow('⚠'))} ${chalk.yellow(message)}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      console.log(`${this.prefix(chalk.red('✖'))} ${chalk.red(message)}`, ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(`${this.prefix(chalk.green('✔'))} ${chalk.green(message)}`, ...args);
    }
  }

  section(title: string): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(chalk.bold(`\n▶ ${title}`));
    }
  }

  item(message: string, icon = '•'): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(`  ${chalk.dim(icon)} ${message}`);
    }
  }

  stats(stats: Record<string, number | string>): void {
    if (this.logLevel > LogLevel.INFO) {
      return;
    }
    const keys = Object.keys(stats);
    if (keys.length === 0) {
      return;
    }
    const maxKeyLength = Math.max(...keys.map(k => k.length));
    for (const [key, value] of Object.entries(stats)) {
      console.log(`  ${chalk.dim(key.padEnd(maxKeyLength))} : ${chalk.bold(value)}`);
    }
  }
}

export const logger = Logger.getInstance();
