import * as assert from 'assert';
import {
  createAssignment,
  createCategoryHeader,
  createGradeBox,
  createLessInfoBox,
  createTeacherIDBox,
  createTerm,
  getDecimalGrade,
  getIntGrade,
  isAssignmentsGridBox,
  isGradeTextBox,
} from '../../types.js';

const q1 = createTerm('Q1', 'Quarter 1');

suite('Grid Box Types Test Suite', () => {

  test('only grades and assignment lists are clickable', () => {
    assert.strictEqual(createGradeBox('1', q1, '90', '5').clickable, true);
    assert.strictEqual(createLessInfoBox('A', q1).clickable, false);
    assert.strictEqual(createTeacherIDBox('Smith', 'Art', '4').clickable, false);
    assert.strictEqual(createAssignment('5', '1', '2', 'HW', { term: 'Q1', grade: '9' }).clickable, false);
  });

  test('variant guards', () => {
    assert.ok(isGradeTextBox(createLessInfoBox('A', q1)));
    assert.ok(!isGradeTextBox(createTeacherIDBox('Smith', 'Art', '4')));
    assert.ok(isAssignmentsGridBox(createCategoryHeader('Tests', '40%', {})));
  });

  test('getIntGrade() finds the first integer attribute', () => {
    assert.strictEqual(getIntGrade(createAssignment('5', '1', '2', 'HW', { term: 'Q1', grade: '85' })), '85');
    assert.strictEqual(getIntGrade(createAssignment('5', '1', '2', 'HW', { term: 'Q1', grade: null })), null);
  });

  test('getDecimalGrade() prefers decimals and falls back to integers', () => {
    const header = createCategoryHeader('Tests', '40', { points: '18', percent: '90.5' });
    assert.strictEqual(getDecimalGrade(header), '90.5');
    assert.strictEqual(getDecimalGrade(createCategoryHeader('Tests', '40', { points: '18' })), '18');
    assert.strictEqual(getDecimalGrade(createCategoryHeader('Tests', '40', { note: 'late' })), null);
  });

});
