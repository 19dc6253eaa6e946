/**
 * Gradebook Scraper - public API
 * Turns a portal gradebook page into terms and classified grid boxes
 */

export { extractGradebook, parseGradebook, type ParsedGradebook } from './gradebook.js';
export { isSessionExpired, SESSION_EXPIRED_MARKER } from './parsers/sessionGuard.js';
export { locatePayload, decodePayload, unwrapPayloadText, PAYLOAD_MARKER } from './parsers/payload.js';
export { extractTerms, repairHeaderFragment } from './parsers/terms.js';
export {
  classifyGridBoxes,
  GRID_BOX_RULES,
  type CellContext,
  type GridBoxRule,
  type RuleResult,
} from './parsers/gridBoxes.js';
export { GradebookError, SessionExpiredError, MalformedDocumentError } from './errors.js';
export { checkGradebookSanity, type SanityCheckResult } from './sanityChecks.js';
export { loadConfig, applyConfig, type ScraperConfig } from './config.js';
export { logger, Logger, LogLevel, type LogEntry, type LoggerOptions } from './logger.js';
export * from './types.js';
