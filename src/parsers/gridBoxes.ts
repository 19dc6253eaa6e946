/**
 * Grid Box Classifier
 *
 * Each body cell is an escaped HTML fragment. What a cell means is decided by
 * testing it against an ordered rule table; the first rule that matches wins
 * and cells no rule matches are skipped.
 *
 * Rule order:
 *   1. assignment  - fragment holds #showAssignmentInfo
 *   2. grade       - fragment holds #showGradeInfo
 *   3. teacher     - cell descriptor carries a cId into the full page
 *   4. less-info   - fragment has visible text
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { MalformedDocumentError } from '../errors.js';
import { logger } from '../logger.js';
import {
  createAssignment,
  createGradeBox,
  createLessInfoBox,
  createTeacherIDBox,
  createTerm,
  type Assignment,
  type AssignmentsListSmaller,
  type GridBox,
  type GridCell,
  type GridRow,
  type Term,
} from '../types.js';

export const ASSIGNMENT_INFO_SELECTOR = '#showAssignmentInfo';
export const GRADE_INFO_SELECTOR = '#showGradeInfo';

// Columns of the teacher row inside the course header element
const TIME_PERIOD_COLUMN = 1;
const COURSE_NAME_COLUMN = 2;
const TEACHER_NAME_COLUMN = 3;

/**
 * Everything a rule may look at for one cell.
 */
export interface CellContext {
  row: GridRow;
  index: number;
  cell: GridCell;
  fragment: cheerio.CheerioAPI;
  terms: readonly Term[];
  page: () => cheerio.CheerioAPI;
}

/** A classified cell plus how many following cells of the row it used up. */
export interface RuleResult {
  box: GridBox;
  consumed: number;
}

export interface GridBoxRule {
  name: string;
  matches: (ctx: CellContext) => boolean;
  build: (ctx: CellContext) => RuleResult;
}

function parseFragment(html: string | undefined): cheerio.CheerioAPI {
  return cheerio.load(html ?? '', null, false);
}

function fragmentText($: cheerio.CheerioAPI): string {
  return $.root().text();
}

function findById($: cheerio.CheerioAPI, id: string): cheerio.Cheerio<Element> {
  return $('[id]').filter((_, el) => $(el).attr('id') === id).first();
}

/**
 * Canonical text of an integer: no "+" sign, no leading zeros, no "-0".
 * Stays a string so long digit runs keep every digit.
 */
export function normalizeInteger(text: string): string {
  const negative = text.startsWith('-');
  const digits = text.replace(/^[+-]/, '').replace(/^0+(?=\d)/, '');
  return negative && digits !== '0' ? `-${digits}` : digits;
}

/**
 * Last integer found in the cells after `from`. The whole rest of the row is
 * scanned; cells that do not read as integers are passed over.
 */
export function findTrailingInteger(cells: readonly GridCell[], from: number): string | null {
  let grade: string | null = null;
  for (let index = from; index < cells.length; index++) {
    const text = fragmentText(parseFragment(cells[index].h)).trim();
    if (/^[+-]?\d+$/.test(text)) {
      grade = normalizeInteger(text);
    }
  }
  return grade;
}

/**
 * Text between the first "(" and the first ")", e.g. "Homework (S1)" -> "S1".
 */
export function extractParenthesized(text: string): string {
  const open = text.indexOf('(');
  const close = text.indexOf(')');
  if (open === -1 || close === -1 || close < open) return '';
  return text.substring(open + 1, close);
}

const assignmentRule: GridBoxRule = {
  name: 'assignment',
  matches: ({ fragment }) => fragment(ASSIGNMENT_INFO_SELECTOR).length > 0,
  build: ({ row, index, fragment }) => {
    const info = fragment(ASSIGNMENT_INFO_SELECTOR).first();
    const grade = findTrailingInteger(row.c, index + 1);
    const label = fragment('span').first().text();
    const assignmentName = fragment('a').first().text().trim();

    if (grade === null) {
      logger.warn('GridBoxes', `No grade found for assignment "${assignmentName}"`);
    }

    const assignment = createAssignment(
      info.attr('data-sid') ?? '',
      info.attr('data-aid') ?? '',
      info.attr('data-gid') ?? '',
      assignmentName,
      {
        term: extractParenthesized(label),
        grade,
      }
    );

    // The remaining cells belong to this assignment's detail block
    return { box: assignment, consumed: row.c.length - index - 1 };
  },
};

const gradeRule: GridBoxRule = {
  name: 'grade',
  matches: ({ fragment }) => fragment(GRADE_INFO_SELECTOR).length > 0,
  build: ({ fragment }) => {
    const info = fragment(GRADE_INFO_SELECTOR).first();
    return {
      box: createGradeBox(
        info.attr('data-cni') ?? '',
        createTerm(info.attr('data-lit') ?? '', info.attr('data-bkt') ?? ''),
        info.text().trim(),
        info.attr('data-sid') ?? ''
      ),
      consumed: 0,
    };
  },
};

const teacherRule: GridBoxRule = {
  name: 'teacher',
  matches: ({ cell }) => cell.cId !== undefined,
  build: ({ cell, page }) => {
    const id = cell.cId ?? '';
    const target = findById(page(), id);
    if (target.length === 0) {
      throw new MalformedDocumentError(`course header element "${id}" not found`);
    }

    const columns = target.children().first().find('td');
    if (columns.length <= TEACHER_NAME_COLUMN) {
      throw new MalformedDocumentError(`course header element "${id}" has ${columns.length} columns`);
    }

    const column = (n: number) => columns.eq(n).text().trim();
    return {
      box: createTeacherIDBox(
        column(TEACHER_NAME_COLUMN),
        column(COURSE_NAME_COLUMN),
        column(TIME_PERIOD_COLUMN)
      ),
      consumed: 0,
    };
  },
};

const lessInfoRule: GridBoxRule = {
  name: 'less-info',
  matches: ({ fragment }) => fragmentText(fragment).trim() !== '',
  build: ({ index, fragment, terms }) => {
    // Term columns sit one to the left of grade columns
    const term = index > 0 ? terms[index - 1] : undefined;
    if (term === undefined) {
      throw new MalformedDocumentError(`no term lines up with text cell at column ${index}`);
    }
    return { box: createLessInfoBox(fragmentText(fragment).trim(), term), consumed: 0 };
  },
};

export const GRID_BOX_RULES: readonly GridBoxRule[] = [
  assignmentRule,
  gradeRule,
  teacherRule,
  lessInfoRule,
];

/**
 * Tracks the assignment group being filled. Any other emission closes it.
 */
class AssignmentGrouper {
  private current: Assignment[] | null = null;

  constructor(private readonly output: GridBox[]) {}

  addAssignment(assignment: Assignment) {
    if (this.current === null) {
      const assignments: Assignment[] = [];
      const group: AssignmentsListSmaller = { kind: 'assignments-list', clickable: true, assignments };
      this.output.push(group);
      this.current = assignments;
    }
    this.current.push(assignment);
  }

  addBox(box: GridBox) {
    this.current = null;
    this.output.push(box);
  }
}

/**
 * Classify body rows into grid boxes, in source order.
 */
export function classifyGridBoxes(
  bodyRows: readonly GridRow[],
  terms: readonly Term[],
  rawHtml: string,
  rules: readonly GridBoxRule[] = GRID_BOX_RULES
): GridBox[] {
  const boxes: GridBox[] = [];
  const grouper = new AssignmentGrouper(boxes);

  let pageDoc: cheerio.CheerioAPI | null = null;
  const page = () => {
    pageDoc ??= cheerio.load(rawHtml);
    return pageDoc;
  };

  bodyRows.forEach((row, rowIdx) => {
    let index = 0;
    while (index < row.c.length) {
      const cell = row.c[index];
      const ctx: CellContext = { row, index, cell, fragment: parseFragment(cell.h), terms, page };
      const rule = rules.find(r => r.matches(ctx));

      if (!rule) {
        index++;
        continue;
      }

      const { box, consumed } = rule.build(ctx);
      logger.debug('GridBoxes', `row ${rowIdx} col ${index}: ${rule.name}`);

      if (box.kind === 'assignment') {
        grouper.addAssignment(box);
      } else {
        grouper.addBox(box);
      }

      index += 1 + consumed;
    }
  });

  return boxes;
}
