import * as assert from 'assert';
import * as path from 'path';
import { applyConfig, loadConfig } from '../../config.js';
import { logger, LogLevel } from '../../logger.js';

suite('Config Test Suite', () => {
  let previousLevel: LogLevel;
  let previousDir: string;

  setup(() => {
    previousLevel = logger.getLevel();
    previousDir = logger.getLogDir();
  });

  teardown(() => {
    logger.configure({ minLevel: previousLevel, logDir: previousDir });
  });

  test('defaults', () => {
    assert.deepStrictEqual(loadConfig({}), {
      logLevel: LogLevel.INFO,
      logDir: path.resolve(process.cwd(), 'logs'),
      saveRawHtmlOnFailure: false,
    });
  });

  test('reads level, directory and raw page saving', () => {
    const config = loadConfig({
      GRADEBOOK_LOG_LEVEL: 'WARN',
      GRADEBOOK_LOG_DIR: '/tmp/gradebook-logs',
      GRADEBOOK_SAVE_RAW_HTML: 'true',
    });
    assert.deepStrictEqual(config, {
      logLevel: LogLevel.WARN,
      logDir: '/tmp/gradebook-logs',
      saveRawHtmlOnFailure: true,
    });
  });

  test('DEBUG_SCRAPER forces debug logging', () => {
    assert.strictEqual(loadConfig({ DEBUG_SCRAPER: 'true', GRADEBOOK_LOG_LEVEL: 'error' }).logLevel, LogLevel.DEBUG);
  });

  test('unknown level names fall back to info', () => {
    assert.strictEqual(loadConfig({ GRADEBOOK_LOG_LEVEL: 'loud' }).logLevel, LogLevel.INFO);
  });

  test('applyConfig() configures the logger', () => {
    applyConfig({ logLevel: LogLevel.ERROR, logDir: '/tmp/gradebook-logs', saveRawHtmlOnFailure: false });
    assert.strictEqual(logger.getLevel(), LogLevel.ERROR);
    assert.strictEqual(logger.getLogDir(), '/tmp/gradebook-logs');
  });

});
