/**
 * Payload Locator & Decoder
 *
 * The gradebook grid ships as a script call of the form
 *
 *   sff.sv('sf_gridObjects',$.extend((sff.getValue('sf_gridObjects') || {}), {"<gridId>":{"th":...,"tb":...}}));
 *
 * inside `<script data-rel="sff">`. The JSON after the grid id is the payload.
 */

import * as cheerio from 'cheerio';
import { MalformedDocumentError } from '../errors.js';
import { logger } from '../logger.js';
import type { ExtractedGradebook, GridCell, GridRow } from '../types.js';

export const PAYLOAD_SCRIPT_SELECTOR = "script[data-rel='sff']";
export const PAYLOAD_MARKER = "sff.sv('sf_gridObjects',$.extend((sff.getValue('sf_gridObjects') ";
export const PAYLOAD_SUFFIX_LENGTH = 5; // "}));" plus the trailing newline

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalise one decoded cell. A null `cId` means the cell has no id.
 */
function toGridCell(value: unknown): GridCell | null {
  if (!isRecord(value)) return null;
  const { h, cId } = value;
  if (h !== undefined && typeof h !== 'string') return null;
  if (cId !== undefined && cId !== null && typeof cId !== 'string') return null;

  const cell: GridCell = {};
  if (h !== undefined) cell.h = h;
  if (typeof cId === 'string') cell.cId = cId;
  return cell;
}

function readCells(value: unknown, where: string): GridCell[] {
  if (!Array.isArray(value)) {
    throw new MalformedDocumentError(`${where} is not an array`);
  }
  const cells: GridCell[] = [];
  for (const item of value) {
    const cell = toGridCell(item);
    if (cell === null) {
      throw new MalformedDocumentError(`${where} holds a cell that is not a grid cell`);
    }
    cells.push(cell);
  }
  return cells;
}

function readRows(value: unknown, where: string): GridRow[] {
  if (!Array.isArray(value)) {
    throw new MalformedDocumentError(`${where} is not an array`);
  }
  return value.map((row: unknown, index) => {
    if (!isRecord(row)) {
      throw new MalformedDocumentError(`${where}[${index}] is not a row`);
    }
    return { c: readCells(row.c, `${where}[${index}].c`) };
  });
}

/**
 * Cut the JSON text out of the payload script's content.
 */
export function unwrapPayloadText(scriptText: string): string {
  const markerIdx = scriptText.indexOf(PAYLOAD_MARKER);
  if (markerIdx === -1) {
    throw new MalformedDocumentError('payload marker not found');
  }

  const wrapped = scriptText.substring(
    markerIdx + PAYLOAD_MARKER.length,
    scriptText.length - PAYLOAD_SUFFIX_LENGTH
  );
  // Drop the "|| {}), {"<gridId>": prefix
  return wrapped.substring(wrapped.indexOf(':') + 1);
}

/**
 * Decode the payload JSON and check it carries header and body rows.
 */
export function decodePayload(json: string): { headerCells: GridCell[]; bodyRows: GridRow[] } {
  let decoded: unknown;
  try {
    decoded = JSON.parse(json);
  } catch (err) {
    throw new MalformedDocumentError('payload is not valid JSON', { cause: err });
  }

  if (!isRecord(decoded) || !isRecord(decoded.th) || !isRecord(decoded.tb)) {
    throw new MalformedDocumentError('payload lacks th/tb sections');
  }

  const headerRows = decoded.th.r;
  if (!Array.isArray(headerRows) || headerRows.length === 0 || !isRecord(headerRows[0])) {
    throw new MalformedDocumentError('payload has no header row');
  }

  return {
    headerCells: readCells(headerRows[0].c, 'th.r[0].c'),
    bodyRows: readRows(decoded.tb.r, 'tb.r'),
  };
}

/**
 * Find the payload script in a gradebook page and decode it.
 */
export function locatePayload(rawHtml: string): ExtractedGradebook {
  const $ = cheerio.load(rawHtml);
  const script = $(PAYLOAD_SCRIPT_SELECTOR).first();

  if (script.length === 0) {
    throw new MalformedDocumentError('payload script not found');
  }

  const { headerCells, bodyRows } = decodePayload(unwrapPayloadText(script.text()));
  logger.debug('Payload', `Decoded ${headerCells.length} header cells, ${bodyRows.length} body rows`);

  return { headerCells, bodyRows, rawHtml };
}
