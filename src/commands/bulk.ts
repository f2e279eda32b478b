import { writeFile } from 'node:fs/promises';
import { processBatch, failedRowsCsv } from '../core/bulk-update.js';
import { readBulkFile } from '../core/csv-reader.js';
import type { BatchReport } from '../types/bulk.js';
import { logger } from '../utils/logger.js';
import type { Sleep } from '../utils/retry.js';
import { createContext, resolveProjectArgs, unwrap, type CommandOptions } from './context.js';

export type BulkCommandOptions = CommandOptions & {
  dryRun?: boolean;
  validate?: boolean;
  snapshotFields?: boolean;
  report?: string;
  failedOutput?: string;
  sleep?: Sleep;
};

export async function bulkCommand(
  projectNumber: string,
  owner: string,
  file: string,
  options: BulkCommandOptions,
): Promise<BatchReport | null> {
  const ctx = await createContext(options, {
    snapshotFields: options.snapshotFields,
    transport: options.transport,
  });
  if (!ctx) return null;

  const rows = unwrap(await readBulkFile(file));
  if (!rows) return null;

  logger.info(`Bulk updating field values from ${file}`);
  if (options.dryRun) {
    logger.info('DRY RUN MODE: Processing file without making changes');
  }

  const projectId = await resolveProjectArgs(ctx, projectNumber, owner);
  if (!projectId) return null;

  const report = await processBatch(
    { resolver: ctx.resolver, mutator: ctx.mutator },
    {
      projectId,
      owner,
      rows,
      dryRun: options.dryRun,
      validate: options.validate,
      rowDelayMs: ctx.config.rowDelay,
      sleep: options.sleep,
    },
  );

  if (report.dryRun) {
    logger.success(`DRY RUN complete: ${report.updated} would be updated, ${report.failed} would fail`);
  } else {
    logger.success(`Bulk update complete: ${report.updated} updated, ${report.failed} failed`);
  }
  if (report.skipped > 0) {
    logger.dim(`Skipped ${report.skipped} blank or comment line(s)`);
  }

  for (const row of report.rows) {
    if (row.status === 'failed' && row.error) {
      logger.error(`  line ${row.line} ${row.itemId} ${row.fieldName}=${row.value}: ${row.error.kind}: ${row.error.message}`);
    }
  }

  if (options.report) {
    await writeFile(options.report, JSON.stringify(report, null, 2) + '\n', 'utf-8');
    logger.info(`Report written to ${options.report}`);
  }
  if (options.failedOutput && report.failed > 0) {
    await writeFile(options.failedOutput, failedRowsCsv(report), 'utf-8');
    logger.info(`Failed rows written to ${options.failedOutput} (re-run with this file)`);
  }

  if (report.failed > 0) {
    process.exitCode = 1;
  }
  return report;
}
