/**
 * Term Extractor
 * Header cells arrive as truncated `<th tooltip="...">` fragments; the ones
 * carrying a tooltip name a selectable grading period.
 */

import * as cheerio from 'cheerio';
import { logger } from '../logger.js';
import { createTerm, type GridCell, type Term } from '../types.js';

const TRAILING_JUNK_LENGTH = 4;

/**
 * Turn a header fragment into a well-formed anchor.
 * e.g. `<th tooltip="2024-S1">Sem 1</th>XXXX` -> `<a tooltip="2024-S1">Sem 1</a>`
 */
export function repairHeaderFragment(fragment: string): string {
  const trimmed = fragment.substring(0, Math.max(0, fragment.length - TRAILING_JUNK_LENGTH));
  const opened = trimmed.replace(/^\s*<th\b/i, '<a');
  const body = opened.replace(/<\/th>\s*$/i, '');
  return `${body}</a>`;
}

export function extractTerms(headerCells: readonly GridCell[]): Term[] {
  const terms: Term[] = [];

  for (const cell of headerCells) {
    const $ = cheerio.load(repairHeaderFragment(cell.h ?? ''), null, false);
    const anchor = $('a').first();
    const tooltip = anchor.attr('tooltip');

    if (tooltip === undefined) continue;

    terms.push(createTerm(anchor.text().trim(), tooltip));
  }

  logger.debug('Terms', `Extracted ${terms.length} of ${headerCells.length} header cells`);
  return terms;
}
