/**
 * Builders for gradebook pages and grid cells used across the suites
 */

import * as fs from 'fs';
import { PAYLOAD_MARKER } from '../parsers/payload.js';
import { SESSION_EXPIRED_MARKER } from '../parsers/sessionGuard.js';
import type { GradebookPayload, GridCell, GridRow } from '../types.js';

export const FIXTURE_PAGE = new URL('./fixtures/gradebook.html', import.meta.url);

export function readFixturePage(): string {
  return fs.readFileSync(FIXTURE_PAGE, 'utf-8');
}

export function headerCell(code: string, tooltip?: string): GridCell {
  const attr = tooltip === undefined ? '' : ` tooltip="${tooltip}"`;
  return { h: `<th scope="col"${attr}>${code}</th><br>` };
}

export function gradeCell(info: { cni: string; lit: string; bkt: string; sid: string; grade: string }): GridCell {
  return {
    h: `<a id="showGradeInfo" data-cni="${info.cni}" data-lit="${info.lit}" data-bkt="${info.bkt}" data-sid="${info.sid}" href="javascript:void(0)">${info.grade}</a>`,
  };
}

export function assignmentCell(info: { sid: string; aid: string; gid: string; label: string; name: string }): GridCell {
  return {
    h: `<div><span>${info.label}</span><a id="showAssignmentInfo" data-sid="${info.sid}" data-aid="${info.aid}" data-gid="${info.gid}" href="javascript:void(0)">${info.name}</a></div>`,
  };
}

export function textCell(html: string): GridCell {
  return { h: html };
}

export function teacherCell(cId: string): GridCell {
  return { h: '', cId };
}

export function teacherTable(id: string, columns: { period: string; course: string; teacher: string }): string {
  return `<div id="${id}"><table><tr><td class="icon"></td><td>${columns.period}</td><td>${columns.course}</td><td>${columns.teacher}</td></tr></table></div>`;
}

export function row(...cells: GridCell[]): GridRow {
  return { c: cells };
}

/**
 * Wrap a payload the way the portal does, escaping "</" so the script
 * element is not closed early.
 */
export function payloadScriptText(payload: unknown, gridId: string = 'stuGradesGrid_01'): string {
  const json = JSON.stringify({ [gridId]: payload }).replace(/<\//g, '<\\/');
  return `\n${PAYLOAD_MARKER}|| {}), ${json}));\n`;
}

export function buildGradebookPage(
  payload: unknown,
  options: { body?: string; expired?: boolean } = {}
): string {
  const notice = options.expired ? `<ul><li>${SESSION_EXPIRED_MARKER}</li></ul>` : '';
  return [
    '<!DOCTYPE html>',
    '<html><head><title>Gradebook</title></head><body>',
    notice,
    `<div id="printGradebook">${options.body ?? ''}</div>`,
    `<script type="text/javascript" data-rel="sff">${payloadScriptText(payload)}</script>`,
    '</body></html>',
  ].join('\n');
}

export function buildPayload(headerCells: GridCell[], bodyRows: GridRow[]): GradebookPayload {
  return { th: { r: [{ c: headerCells }] }, tb: { r: bodyRows } };
}
