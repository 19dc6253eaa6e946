/**
 * Gradebook extraction entry points
 *
 * extractGradebook() only checks the session and decodes the payload.
 * Terms must be read before grid boxes because text cells borrow their
 * term from the header row; parseGradebook() runs both in that order.
 */

import { SessionExpiredError } from './errors.js';
import { logger } from './logger.js';
import { classifyGridBoxes } from './parsers/gridBoxes.js';
import { locatePayload } from './parsers/payload.js';
import { isSessionExpired } from './parsers/sessionGuard.js';
import { extractTerms } from './parsers/terms.js';
import type { ExtractedGradebook, GridBox, Term } from './types.js';

export interface ParsedGradebook {
  terms: Term[];
  gridBoxes: GridBox[];
  rawHtml: string;
}

export function extractGradebook(rawHtml: string): ExtractedGradebook {
  if (isSessionExpired(rawHtml)) {
    logger.warn('Gradebook', 'Session expired page received');
    throw new SessionExpiredError();
  }
  return locatePayload(rawHtml);
}

export function parseGradebook(rawHtml: string): ParsedGradebook {
  const { headerCells, bodyRows } = extractGradebook(rawHtml);
  const terms = extractTerms(headerCells);
  const gridBoxes = classifyGridBoxes(bodyRows, terms, rawHtml);

  logger.debug('Gradebook', `Parsed ${terms.length} terms, ${gridBoxes.length} grid boxes`);
  return { terms, gridBoxes, rawHtml };
}
