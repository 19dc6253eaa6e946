/**
 * Environment configuration (.env supported)
 */

import * as path from 'path';
import { config as loadEnv } from 'dotenv';
import { logger, LogLevel, parseLogLevel } from './logger.js';

export interface ScraperConfig {
  logLevel: LogLevel;
  logDir: string;
  saveRawHtmlOnFailure: boolean;
}

/**
 * Read configuration from the environment. Pass `env` to skip `.env` loading.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): ScraperConfig {
  if (!env) {
    loadEnv();
  }
  const source = env ?? process.env;

  const logLevel = source.DEBUG_SCRAPER === 'true'
    ? LogLevel.DEBUG
    : parseLogLevel(source.GRADEBOOK_LOG_LEVEL) ?? LogLevel.INFO;

  return {
    logLevel,
    logDir: path.resolve(source.GRADEBOOK_LOG_DIR || path.join(process.cwd(), 'logs')),
    saveRawHtmlOnFailure: source.GRADEBOOK_SAVE_RAW_HTML === 'true',
  };
}

export function applyConfig(config: ScraperConfig) {
  logger.configure({ minLevel: config.logLevel, logDir: config.logDir });
}
