import type { ErrorKind } from '../utils/errors.js';

/**
 * One data line of a bulk CSV file, before trimming.
 */
export interface BulkRow {
  line: number;
  itemId: string;
  fieldName: string;
  value: string;
}

export type RowStatus = 'updated' | 'would-update' | 'failed';

export interface RowOutcome {
  line: number;
  itemId: string;
  fieldName: string;
  value: string;
  status: RowStatus;
  error?: { kind: ErrorKind; message: string };
}

export interface BatchReport {
  dryRun: boolean;
  attempted: number;
  // In dry run this counts rows that would be updated
  updated: number;
  failed: number;
  skipped: number;
  rows: RowOutcome[];
}
