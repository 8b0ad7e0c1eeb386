import { randomUUID } from 'node:crypto';
import { ZodError } from 'zod';
import {
  capErrorMessage,
  createLogger,
  isInventoryError,
  type Logger,
} from '@stockroom/shared';
import { importHistoricalItem } from './catalog.js';
import { normalizeImportRecord, type ImportRecord } from './normalize.js';

export interface ImportOptions {
  /** Creation timestamp for every imported row */
  recordedAt: Date;
  logger?: Logger;
  /** Correlates the log lines of one run; generated when absent */
  importId?: string;
}

export interface ImportFailure {
  /** Zero-based position of the record in the input */
  index: number;
  sku: string | null;
  code: string;
  message: string;
}

export interface ImportSummary {
  importId: string;
  imported: number;
  skipped: number;
  failed: ImportFailure[];
}

function describeRejection(error: unknown): { code: string; message: string } | null {
  if (isInventoryError(error)) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
      .join('; ');
    return { code: 'VALIDATION_ERROR', message };
  }
  return null;
}

/**
 * Import already-read stock-sheet rows one by one, each in its own
 * transaction. A row rejected by validation or by the core (duplicate SKU,
 * bad margin, ...) is logged and reported and the run carries on. Any other
 * failure, such as a lost connection, ends the run and propagates.
 */
export async function importRecords(
  records: Iterable<ImportRecord> | AsyncIterable<ImportRecord>,
  options: ImportOptions
): Promise<ImportSummary> {
  const importId = options.importId ?? randomUUID();
  const log = (options.logger ?? createLogger({ service: 'import' })).child({ component: 'import', importId });

  const summary: ImportSummary = { importId, imported: 0, skipped: 0, failed: [] };
  let index = 0;

  for await (const record of records) {
    const position = index++;
    const item = normalizeImportRecord(record);

    if (!item) {
      summary.skipped++;
      log.debug('Skipping row without SKU', { index: position });
      continue;
    }

    try {
      await importHistoricalItem(item, { recordedAt: options.recordedAt, logger: log });
      summary.imported++;
    } catch (error) {
      const rejection = describeRejection(error);
      if (!rejection) {
        log.error('Import aborted', error, { index: position, sku: item.sku });
        throw error;
      }

      summary.failed.push({
        index: position,
        sku: item.sku,
        code: rejection.code,
        message: capErrorMessage(rejection.message),
      });
      log.warn('Row rejected', { index: position, sku: item.sku, code: rejection.code });
    }
  }

  log.info('Import finished', {
    imported: summary.imported,
    skipped: summary.skipped,
    failed: summary.failed.length,
  });
  return summary;
}
