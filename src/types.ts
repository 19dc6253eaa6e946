/**
 * Gradebook Type Definitions
 */

// ============ Payload Types ============

/** One cell of the embedded grid payload. `h` holds the cell's HTML fragment. */
export interface GridCell {
  h?: string;
  cId?: string;         // id of the element in the full page that holds the course header
}

export interface GridRow {
  c: GridCell[];
}

export interface GradebookPayload {
  th: { r: GridRow[] };
  tb: { r: GridRow[] };
}

export interface ExtractedGradebook {
  headerCells: GridCell[];
  bodyRows: GridRow[];
  rawHtml: string;      // kept so teacher rows can be looked up by id
}

// ============ Term ============

/**
 * A grading period. Two terms are the same term when their codes match,
 * whatever their display names say.
 */
export interface Term {
  readonly termCode: string;    // "Sem 1", "Q1"
  readonly termName: string;    // "2024-S1"
}

export function createTerm(termCode: string, termName: string): Term {
  return Object.freeze({ termCode, termName });
}

export function sameTerm(a: Term, b: Term): boolean {
  return a.termCode === b.termCode;
}

export function termKey(term: Term): string {
  return term.termCode;
}

// ============ Grid Boxes ============

/** Marks the start of a new course section. */
export interface TeacherIDBox {
  readonly kind: 'teacher-id';
  readonly clickable: false;
  readonly teacherName: string;
  readonly courseName: string;
  readonly timePeriod: string;
}

/** Unclickable behavior or letter grade. */
export interface LessInfoBox {
  readonly kind: 'less-info';
  readonly clickable: false;
  readonly behavior: string;
  readonly term: Term;
}

/** Clickable numbered grade for one term of one course. */
export interface GradeBox {
  readonly kind: 'grade';
  readonly clickable: true;
  readonly courseNumber: string;
  readonly term: Term;
  readonly grade: string;
  readonly studentID: string;
}

export type GradeTextBox = LessInfoBox | GradeBox;

/** Ordered attribute mapping; `null` means the value could not be recovered. */
export type AttributeMap = Readonly<Record<string, string | null>>;

export type AssignmentAttributes = AttributeMap & {
  readonly term: string;
  readonly grade: string | null;
};

export interface Assignment {
  readonly kind: 'assignment';
  readonly clickable: false;
  readonly studentID: string;
  readonly assignmentID: string;
  readonly gbID: string;
  readonly assignmentName: string;
  readonly attributes: AssignmentAttributes;
}

/** Start of an assignment category. The portal has not been seen to emit these. */
export interface CategoryHeader {
  readonly kind: 'category-header';
  readonly clickable: false;
  readonly catName: string;
  readonly weight: string;
  readonly attributes: AttributeMap;
}

export type AssignmentsGridBox = Assignment | CategoryHeader;

/** Consecutive assignments of one grade-detail block. */
export interface AssignmentsListSmaller {
  readonly kind: 'assignments-list';
  readonly clickable: true;
  readonly assignments: readonly Assignment[];
}

export type GridBox =
  | TeacherIDBox
  | GradeTextBox
  | AssignmentsGridBox
  | AssignmentsListSmaller;

export type GridBoxKind = GridBox['kind'];

export function createTeacherIDBox(teacherName: string, courseName: string, timePeriod: string): TeacherIDBox {
  return { kind: 'teacher-id', clickable: false, teacherName, courseName, timePeriod };
}

export function createLessInfoBox(behavior: string, term: Term): LessInfoBox {
  return { kind: 'less-info', clickable: false, behavior, term };
}

export function createGradeBox(courseNumber: string, term: Term, grade: string, studentID: string): GradeBox {
  return { kind: 'grade', clickable: true, courseNumber, term, grade, studentID };
}

export function createAssignment(
  studentID: string,
  assignmentID: string,
  gbID: string,
  assignmentName: string,
  attributes: AssignmentAttributes
): Assignment {
  return { kind: 'assignment', clickable: false, studentID, assignmentID, gbID, assignmentName, attributes };
}

export function createCategoryHeader(catName: string, weight: string, attributes: AttributeMap): CategoryHeader {
  return { kind: 'category-header', clickable: false, catName, weight, attributes };
}

export function isGradeTextBox(box: GridBox): box is GradeTextBox {
  return box.kind === 'grade' || box.kind === 'less-info';
}

export function isAssignmentsGridBox(box: GridBox): box is AssignmentsGridBox {
  return box.kind === 'assignment' || box.kind === 'category-header';
}

// ============ Grade Readers ============

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?\d*\.\d+$/;

/**
 * First attribute value that reads as an integer, or null.
 * Callers must handle the null.
 */
export function getIntGrade(box: AssignmentsGridBox): string | null {
  for (const value of Object.values(box.attributes)) {
    if (value !== null && INTEGER_PATTERN.test(value)) {
      return value;
    }
  }
  return null;
}

/**
 * First attribute value that reads as a decimal number,
 * falling back to {@link getIntGrade}.
 */
export function getDecimalGrade(box: AssignmentsGridBox): string | null {
  for (const value of Object.values(box.attributes)) {
    if (value !== null && DECIMAL_PATTERN.test(value)) {
      return value;
    }
  }
  return getIntGrade(box);
}
