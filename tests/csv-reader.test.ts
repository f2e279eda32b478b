import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { parseBulkCsv, readBulkFile } from '../src/core/csv-reader.js';

describe('parseBulkCsv', () => {
  it('should drop the header and number rows by file line', () => {
    const rows = parseBulkCsv('item_id,field_name,value\nI_1,Status,Done\nI_2,Estimate,3\n');

    expect(rows).toEqual([
      { line: 2, itemId: 'I_1', fieldName: 'Status', value: 'Done' },
      { line: 3, itemId: 'I_2', fieldName: 'Estimate', value: '3' },
    ]);
  });

  it('should accept a camel-case or quoted header', () => {
    expect(parseBulkCsv('itemId,fieldName,value\nI_1,Notes,x')).toHaveLength(1);
    expect(parseBulkCsv('"item_id","field_name","value"\nI_1,Notes,x')).toHaveLength(1);
  });

  it('should recognise the header after a byte order mark', () => {
    const rows = parseBulkCsv('\uFEFFitem_id,field_name,value\nI_1,Status,Done\n');

    expect(rows).toEqual([{ line: 2, itemId: 'I_1', fieldName: 'Status', value: 'Done' }]);
  });

  it('should keep commas inside the value column', () => {
    const [row] = parseBulkCsv('I_1,Notes,first, second, third');

    expect(row.value).toBe('first, second, third');
  });

  it('should handle CRLF line endings', () => {
    const rows = parseBulkCsv('I_1,Notes,a\r\nI_2,Notes,b\r\n');

    expect(rows.map((r) => r.value)).toEqual(['a', 'b']);
  });

  it('should keep blank and comment lines for the processor to skip', () => {
    const rows = parseBulkCsv('I_1,Notes,a\n\n# I_2,Notes,b\nI_3,Notes,c');

    expect(rows.map((r) => [r.line, r.itemId])).toEqual([[1, 'I_1'], [2, ''], [3, '# I_2'], [4, 'I_3']]);
  });

  it('should fill missing columns with empty strings', () => {
    expect(parseBulkCsv('I_1,Notes')).toEqual([{ line: 1, itemId: 'I_1', fieldName: 'Notes', value: '' }]);
    expect(parseBulkCsv('I_1')).toEqual([{ line: 1, itemId: 'I_1', fieldName: '', value: '' }]);
  });

  it('should return no rows for empty input', () => {
    expect(parseBulkCsv('')).toEqual([]);
  });
});

describe('readBulkFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'projfields-csv-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read and parse a file from disk', async () => {
    const path = join(dir, 'updates.csv');
    writeFileSync(path, 'item_id,field_name,value\nI_1,Status,Done\n');

    const result = await readBulkFile(path);

    expect(result).toEqual({ ok: true, value: [{ line: 2, itemId: 'I_1', fieldName: 'Status', value: 'Done' }] });
  });

  it('should fail with NotFoundError for a missing file', async () => {
    const path = join(dir, 'missing.csv');

    const result = await readBulkFile(path);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('NotFoundError');
      expect(result.error.message).toBe(`File not found: ${path}`);
    }
  });
});
