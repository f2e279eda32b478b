import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { CSV_HEADER_ITEM_COLUMN } from '../constants.js';
import type { BulkRow } from '../types/bulk.js';
import { NotFoundError } from '../utils/errors.js';
import { fail, ok, type Result } from '../utils/result.js';

const HEADER_CELLS = new Set([CSV_HEADER_ITEM_COLUMN, 'itemId']);

/**
 * Split bulk-update CSV text (`item_id,field_name,value`) into rows.
 *
 * The value column takes the rest of the line, commas included. Header lines
 * are dropped; blank and `#` lines are kept so that line numbers stay exact
 * and the processor can report them as skipped.
 */
export function parseBulkCsv(content: string): BulkRow[] {
  // Spreadsheet exports often start with a UTF-8 byte order mark
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const rows: BulkRow[] = [];
  lines.forEach((text, index) => {
    const [itemId, fieldName, value] = splitCells(text);
    if (HEADER_CELLS.has(itemId.trim().replace(/^"|"$/g, ''))) return;
    rows.push({ line: index + 1, itemId, fieldName, value });
  });
  return rows;
}

export async function readBulkFile(path: string): Promise<Result<BulkRow[]>> {
  if (!existsSync(path)) {
    return fail(new NotFoundError(`File not found: ${path}`));
  }
  const content = await readFile(path, 'utf-8');
  return ok(parseBulkCsv(content));
}

function splitCells(text: string): [string, string, string] {
  const first = text.indexOf(',');
  if (first < 0) return [text, '', ''];
  const second = text.indexOf(',', first + 1);
  if (second < 0) return [text.slice(0, first), text.slice(first + 1), ''];
  return [text.slice(0, first), text.slice(first + 1, second), text.slice(second + 1)];
}
