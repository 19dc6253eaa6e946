#!/usr/bin/env npx tsx

/**
 * Debug script: run the extractor over saved gradebook pages
 */

import { Command } from 'commander';
import { applyConfig, loadConfig } from './config.js';
import { inspectGradebookFile } from './inspect.js';
import { logger, LogLevel } from './logger.js';

const program = new Command();

program
  .name('gradebook-debug')
  .description('Parse saved gradebook pages and report what was extracted')
  .argument('<files...>', 'saved gradebook HTML pages')
  .option('--save-raw', 'Save pages that fail to parse under the log directory')
  .option('-v, --verbose', 'Verbose output');

program.parse();

const options = program.opts<{ saveRaw?: boolean; verbose?: boolean }>();

function main() {
  const config = loadConfig();
  applyConfig(config);
  if (options.verbose) {
    logger.configure({ minLevel: LogLevel.DEBUG });
  }
  logger.startSession('debug');

  let failures = 0;
  for (const file of program.args) {
    try {
      const { warnings, ...summary } = inspectGradebookFile(file, {
        saveRawOnFailure: options.saveRaw ?? config.saveRawHtmlOnFailure,
      });
      logger.summary(file, summary);
      for (const warning of warnings) {
        logger.warn('Debug', warning);
      }
    } catch (err) {
      failures++;
      logger.error('Debug', err instanceof Error ? err.message : String(err));
      if (options.verbose && err instanceof Error) {
        console.error(err.stack);
      }
    }
  }

  logger.flush();
  process.exitCode = failures > 0 ? 1 : 0;
}

main();
