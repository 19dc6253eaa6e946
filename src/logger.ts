/**
 * Gradebook Logger
 *
 * Console lines are colored; every kept entry is also buffered and written
 * to the session file on flush(), one plain line per entry.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  data?: unknown;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  logDir?: string;
}

export type SummaryValue = number | string | boolean;

const LEVELS: Record<LogLevel, { name: string; paint: (text: string) => string }> = {
  [LogLevel.DEBUG]: { name: 'DEBUG', paint: chalk.dim },
  [LogLevel.INFO]: { name: 'INFO', paint: chalk.green },
  [LogLevel.WARN]: { name: 'WARN', paint: chalk.yellow },
  [LogLevel.ERROR]: { name: 'ERROR', paint: chalk.red },
};

/**
 * Parse a level name ("debug", "WARN", ...). Unknown names give undefined.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return undefined;
  }
}

/** One log file line: `HH:MM:SS.mmm [LEVEL] [Component] message {data}` */
export function formatEntry(entry: LogEntry): string {
  const data = entry.data === undefined ? '' : ` ${JSON.stringify(entry.data)}`;
  return `${entry.timestamp} [${entry.level}] [${entry.component}] ${entry.message}${data}`;
}

/** `key: value` lines with the values lined up. */
export function formatSummary(data: Record<string, SummaryValue>): string[] {
  const keys = Object.keys(data);
  const width = Math.max(0, ...keys.map(k => k.length));
  return keys.map(key => `${`${key}:`.padEnd(width + 1)} ${String(data[key])}`);
}

// Reasons become part of a file name
function fileSafe(reason: string): string {
  return reason.replace(/[^\w.-]+/g, '_') || 'page';
}

export class Logger {
  private minLevel: LogLevel;
  private logDir: string;
  private logFile: string | null = null;
  private buffer: LogEntry[] = [];

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? LogLevel.INFO;
    this.logDir = options.logDir ?? path.join(process.cwd(), 'logs');
  }

  configure(options: LoggerOptions) {
    if (options.minLevel !== undefined) this.minLevel = options.minLevel;
    if (options.logDir !== undefined) this.logDir = options.logDir;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  getLogDir(): string {
    return this.logDir;
  }

  /**
   * Open a new session file under the log directory and clear the buffer.
   */
  startSession(name: string = 'extract') {
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(this.logDir, `${name}-${stamp}.log`);
    this.buffer = [];
    this.info('Logger', `Session started: ${this.logFile}`);
  }

  /** Entries buffered since the last flush */
  getBuffer(): readonly LogEntry[] {
    return this.buffer;
  }

  private write(level: LogLevel, component: string, message: string, data?: unknown) {
    if (level < this.minLevel) return;

    const { name, paint } = LEVELS[level];
    const entry: LogEntry = {
      timestamp: new Date().toISOString().substring(11, 23),
      level: name,
      component,
      message,
      data,
    };

    console.log(`${chalk.dim(entry.timestamp)} ${paint(name.padEnd(5))} ${chalk.cyan(`[${component}]`)} ${message}`);
    if (data !== undefined) {
      console.log(chalk.dim(`  ${JSON.stringify(data)}`));
    }
    this.buffer.push(entry);
  }

  debug(component: string, message: string, data?: unknown) {
    this.write(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: unknown) {
    this.write(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: unknown) {
    this.write(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: unknown) {
    this.write(LogLevel.ERROR, component, message, data);
  }

  /**
   * Print a titled key/value listing. The values are buffered with the title
   * so they reach the session file too.
   */
  summary(title: string, data: Record<string, SummaryValue>) {
    console.log(chalk.bold(title));
    for (const line of formatSummary(data)) {
      console.log(`  ${line}`);
    }
    this.buffer.push({
      timestamp: new Date().toISOString().substring(11, 23),
      level: LEVELS[LogLevel.INFO].name,
      component: 'Summary',
      message: title,
      data,
    });
  }

  /**
   * Write a page that could not be handled to the log directory.
   * Returns the written path.
   */
  saveRawHTML(reason: string, html: string): string {
    fs.mkdirSync(this.logDir, { recursive: true });
    const filename = `raw-${fileSafe(reason)}-${Date.now()}.html`;
    const filepath = path.join(this.logDir, filename);
    fs.writeFileSync(filepath, html);
    this.warn('Logger', `Saved raw HTML: ${filename}`);
    return filepath;
  }

  flush() {
    if (this.logFile === null || this.buffer.length === 0) return;
    fs.mkdirSync(this.logDir, { recursive: true });
    fs.appendFileSync(this.logFile, this.buffer.map(formatEntry).join('\n') + '\n');
    this.buffer = [];
  }
}

export const logger = new Logger({
  minLevel: process.env.DEBUG_SCRAPER === 'true' ? LogLevel.DEBUG : LogLevel.INFO,
});
