import * as assert from 'assert';
import * as sinon from 'sinon';
import { logger } from '../../logger.js';
import { checkGradebookSanity } from '../../sanityChecks.js';
import {
  createAssignment,
  createGradeBox,
  createLessInfoBox,
  createTeacherIDBox,
  createTerm,
  type GridBox,
} from '../../types.js';

const q1 = createTerm('Q1', 'Quarter 1');

suite('Sanity Checks Test Suite', () => {
  let sandbox: sinon.SinonSandbox;

  setup(() => {
    sandbox = sinon.createSandbox();
    sandbox.stub(logger, 'warn');
    sandbox.stub(logger, 'debug');
  });

  teardown(() => {
    sandbox.restore();
  });

  test('clean gradebook passes', () => {
    const gridBoxes: GridBox[] = [
      createTeacherIDBox('Smith, Ann', 'Algebra I', '1'),
      createGradeBox('101', createTerm('Quarter 1', 'Q1'), '90', '5'),
      createLessInfoBox('A', q1),
      {
        kind: 'assignments-list',
        clickable: true,
        assignments: [createAssignment('5', '1', '2', 'HW', { term: 'Q1', grade: '8' })],
      },
    ];

    const result = checkGradebookSanity({ terms: [q1], gridBoxes });

    assert.strictEqual(result.passed, true);
    assert.strictEqual(result.termCount, 1);
    assert.deepStrictEqual(result.warnings, []);
    assert.deepStrictEqual(result.kindCounts, {
      'teacher-id': 1,
      'less-info': 1,
      'grade': 1,
      'assignment': 1,
      'category-header': 0,
      'assignments-list': 1,
    });
  });

  test('reports each structural problem', () => {
    const gridBoxes: GridBox[] = [
      createGradeBox('101', createTerm('Quarter 9', 'Q9'), '90', '5'),
      {
        kind: 'assignments-list',
        clickable: true,
        assignments: [createAssignment('5', '77', '2', 'HW', { term: 'Q1', grade: null })],
      },
    ];

    const result = checkGradebookSanity({ terms: [q1, createTerm('Q1', 'First Quarter')], gridBoxes });

    assert.strictEqual(result.passed, false);
    assert.deepStrictEqual(result.warnings, [
      'Duplicate term code: Q1',
      'Grade for 101 uses unknown term Q9',
      'grade box before any course header',
      'Assignment 77 has no grade',
    ]);
  });

});
