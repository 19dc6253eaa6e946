/**
 * Sanity Checks - flag gradebook results that look structurally off
 * Catches portal layout drift that still decodes cleanly
 */

import { logger } from './logger.js';
import { termKey, type GridBox, type GridBoxKind, type Term } from './types.js';

export interface SanityCheckResult {
  passed: boolean;
  termCount: number;
  kindCounts: Record<GridBoxKind, number>;
  warnings: string[];
}

function emptyKindCounts(): Record<GridBoxKind, number> {
  return {
    'teacher-id': 0,
    'less-info': 0,
    'grade': 0,
    'assignment': 0,
    'category-header': 0,
    'assignments-list': 0,
  };
}

/**
 * Check a parsed gradebook for duplicate terms, orphan grades and
 * assignments whose grade could not be recovered.
 */
export function checkGradebookSanity(
  parsed: { terms: readonly Term[]; gridBoxes: readonly GridBox[] },
  rawHtml?: string
): SanityCheckResult {
  const { terms, gridBoxes } = parsed;
  const result: SanityCheckResult = {
    passed: true,
    termCount: terms.length,
    kindCounts: emptyKindCounts(),
    warnings: [],
  };

  // Duplicate term codes
  const seen = new Set<string>();
  for (const term of terms) {
    const key = termKey(term);
    if (seen.has(key)) {
      result.warnings.push(`Duplicate term code: ${key}`);
    }
    seen.add(key);
  }

  // Grade boxes reference terms by either field of the header term
  const headerLabels = new Set(terms.flatMap(t => [t.termCode, t.termName]));
  let courseSeen = false;

  for (const box of gridBoxes) {
    result.kindCounts[box.kind]++;

    switch (box.kind) {
      case 'teacher-id':
        courseSeen = true;
        break;
      case 'grade':
        if (!headerLabels.has(box.term.termCode) && !headerLabels.has(box.term.termName)) {
          result.warnings.push(`Grade for ${box.courseNumber} uses unknown term ${box.term.termName}`);
        }
      // falls through
      case 'less-info':
        if (!courseSeen) {
          result.warnings.push(`${box.kind} box before any course header`);
        }
        break;
      case 'assignments-list':
        result.kindCounts.assignment += box.assignments.length;
        for (const assignment of box.assignments) {
          if (assignment.attributes.grade === null) {
            result.warnings.push(`Assignment ${assignment.assignmentID} has no grade`);
          }
        }
        break;
      default:
        break;
    }
  }

  result.passed = result.warnings.length === 0;

  if (!result.passed) {
    logger.warn('Sanity', `${result.warnings.length} warning(s)`, result.warnings);
    if (rawHtml) {
      logger.saveRawHTML('sanity-failed', rawHtml);
    }
  } else {
    logger.debug('Sanity', `PASS (${gridBoxes.length} boxes)`);
  }

  return result;
}
