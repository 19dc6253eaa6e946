/**
 * Inspect a saved gradebook page
 */

import * as fs from 'fs';
import { GradebookError } from './errors.js';
import { parseGradebook, type ParsedGradebook } from './gradebook.js';
import { logger } from './logger.js';
import { checkGradebookSanity } from './sanityChecks.js';

export interface InspectOptions {
  saveRawOnFailure?: boolean;
}

export type InspectSummary = {
  file: string;
  bytes: number;
  terms: number;
  gridBoxes: number;
  courses: number;
  grades: number;
  lessInfo: number;
  assignmentGroups: number;
  assignments: number;
  sanityPassed: boolean;
  warnings: string[];
};

export function inspectGradebookFile(file: string, options: InspectOptions = {}): InspectSummary {
  const html = fs.readFileSync(file, 'utf-8');

  let parsed: ParsedGradebook;
  try {
    parsed = parseGradebook(html);
  } catch (err) {
    if (err instanceof GradebookError) {
      logger.error('Inspect', `${file}: ${err.message}`);
      if (options.saveRawOnFailure) {
        logger.saveRawHTML(err.name, html);
      }
    }
    throw err;
  }

  const sanity = checkGradebookSanity(parsed, options.saveRawOnFailure ? html : undefined);

  return {
    file,
    bytes: Buffer.byteLength(html, 'utf-8'),
    terms: parsed.terms.length,
    gridBoxes: parsed.gridBoxes.length,
    courses: sanity.kindCounts['teacher-id'],
    grades: sanity.kindCounts.grade,
    lessInfo: sanity.kindCounts['less-info'],
    assignmentGroups: sanity.kindCounts['assignments-list'],
    assignments: sanity.kindCounts.assignment,
    sanityPassed: sanity.passed,
    warnings: sanity.warnings,
  };
}
