import { readCsvRows } from '../core/csv-reader.js';
import { logger } from '../utils/logger.js';

/**
 * Parse a CSV file offline and show how each row would be imported.
 */
export async function validateCommand(csvPath: string, options: { defaultStatus?: string }): Promise<void> {
  const { rows, skipped } = await readCsvRows(csvPath, { defaultStatus: options.defaultStatus });

  for (const row of rows) {
    const labels = row.labels.length > 0 ? row.labels.join(', ') : '(none)';
    logger.info(`Row ${row.row}: ${row.title}`);
    logger.dim(`  status: ${row.status}  labels: ${labels}`);
  }

  logger.info(`\n${rows.length} importable row(s), ${skipped.length} skipped.`);
  if (rows.length === 0) {
    logger.error(`No importable rows in ${csvPath}`);
    process.exitCode = 1;
  }
}
