import { BULK_ROW_DELAY_MS } from '../constants.js';
import type { BatchReport, BulkRow, RowOutcome } from '../types/bulk.js';
import { ValidationError, type ProjectFieldsError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { fail, ok, type Result } from '../utils/result.js';
import { sleep as defaultSleep, type Sleep } from '../utils/retry.js';
import type { FieldMutator } from './field-mutator.js';
import type { IdentifierResolver } from './resolver.js';

export interface BulkEngine {
  resolver: IdentifierResolver;
  mutator: FieldMutator;
}

export interface BatchOptions {
  projectId: string;
  owner: string;
  rows: BulkRow[];
  dryRun?: boolean;
  /** In dry run, also resolve each row's field and value (reads only). */
  validate?: boolean;
  rowDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Strip surrounding whitespace and one pair of double quotes left over from CSV.
 */
export function cleanCell(cell: string): string {
  return cell.replace(/^\s*"?/, '').replace(/"?\s*$/, '');
}

export function isSkippableRow(row: BulkRow): boolean {
  if (row.itemId.trim() === '' && row.fieldName.trim() === '' && row.value.trim() === '') return true;
  return /^\s*#/.test(row.itemId);
}

/**
 * Apply rows in order. A failing row is recorded and the run moves on; this
 * function does not throw for row errors.
 */
export async function processBatch(engine: BulkEngine, options: BatchOptions): Promise<BatchReport> {
  const dryRun = options.dryRun ?? false;
  const rowDelayMs = options.rowDelayMs ?? BULK_ROW_DELAY_MS;
  const wait = options.sleep ?? defaultSleep;
  const log = options.logger ?? defaultLogger;

  const report: BatchReport = {
    dryRun,
    attempted: 0,
    updated: 0,
    failed: 0,
    skipped: 0,
    rows: [],
  };

  log.debug(`Bulk update for project ${options.projectId} (owner: ${options.owner}), ${options.rows.length} row(s)`);

  for (const raw of options.rows) {
    if (isSkippableRow(raw)) {
      report.skipped++;
      continue;
    }

    const row: BulkRow = {
      line: raw.line,
      itemId: cleanCell(raw.itemId),
      fieldName: cleanCell(raw.fieldName),
      value: cleanCell(raw.value),
    };

    if (!dryRun && report.attempted > 0 && rowDelayMs > 0) {
      await wait(rowDelayMs);
    }
    report.attempted++;

    log.info(`Line ${row.line}: Updating ${row.itemId} -> ${row.fieldName} = ${row.value}`);

    const result = dryRun
      ? await previewRow(engine, options.projectId, row, options.validate ?? false)
      : await applyRow(engine, options.projectId, row);

    if (result.ok) {
      report.updated++;
      report.rows.push({ ...row, status: dryRun ? 'would-update' : 'updated' });
      if (dryRun) {
        log.info(`Line ${row.line}: DRY RUN: would set '${row.fieldName}' to '${row.value}' on ${row.itemId}`);
      } else {
        log.success(`Line ${row.line}: Updated ${row.itemId}`);
      }
    } else {
      report.failed++;
      report.rows.push(failedOutcome(row, result.error));
      log.warn(`Line ${row.line}: Failed to update ${row.itemId} (${row.fieldName} = ${row.value}): ${result.error.kind}: ${result.error.message}`);
    }
  }

  return report;
}

/** Rows of a report that failed, in the CSV layout they were read from. */
export function failedRowsCsv(report: BatchReport): string {
  const lines = ['item_id,field_name,value'];
  for (const row of report.rows) {
    if (row.status !== 'failed') continue;
    lines.push([row.itemId, row.fieldName, row.value].map(quoteCell).join(','));
  }
  return lines.join('\n') + '\n';
}

async function applyRow(engine: BulkEngine, projectId: string, row: BulkRow): Promise<Result<void>> {
  const missing = checkRow(row);
  if (!missing.ok) return missing;

  const field = await engine.resolver.resolveField(projectId, row.fieldName);
  if (!field.ok) return field;
  return engine.mutator.setField(projectId, row.itemId, field.value, row.value);
}

async function previewRow(engine: BulkEngine, projectId: string, row: BulkRow, validate: boolean): Promise<Result<void>> {
  const missing = checkRow(row);
  if (!missing.ok || !validate) return missing;

  const field = await engine.resolver.resolveField(projectId, row.fieldName);
  if (!field.ok) return field;
  const value = engine.mutator.buildFieldValue(field.value, row.value);
  return value.ok ? ok(undefined) : value;
}

function checkRow(row: BulkRow): Result<void> {
  if (!row.itemId || !row.fieldName) {
    return fail(new ValidationError('Row needs an item id and a field name'));
  }
  return ok(undefined);
}

function failedOutcome(row: BulkRow, error: ProjectFieldsError): RowOutcome {
  return { ...row, status: 'failed', error: { kind: error.kind, message: error.message } };
}

function quoteCell(cell: string): string {
  return /^\s|\s$|,/.test(cell) ? `"${cell}"` : cell;
}
