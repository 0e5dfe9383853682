import { resolveImportConfig, type ConfigFlags } from '../core/config.js';
import { readCsvRows } from '../core/csv-reader.js';
import { formatStatusOptions } from '../core/field-mapper.js';
import { importRows } from '../core/import-engine.js';
import { LabelRegistry } from '../core/labels.js';
import type { ImportResult } from '../types/import.js';
import { logger } from '../utils/logger.js';
import { connectToProject } from './connect.js';

export interface ImportCommandOptions extends ConfigFlags {
  dryRun?: boolean;
  updateExisting?: boolean;
}

function printImportResult(result: ImportResult): void {
  logger.info('\n--- Import Results ---');
  logger.info(`Created: ${result.created}`);
  logger.info(`Updated: ${result.updated}`);
  logger.info(`Skipped: ${result.skipped}`);

  if (result.errors.length > 0) {
    logger.warn(`Errors:  ${result.errors.length}`);
    for (const err of result.errors) {
      logger.error(`  Row ${err.row} ("${err.title}"): ${err.error}`);
    }
  }
}

export async function importCommand(csvPath: string | undefined, options: ImportCommandOptions): Promise<ImportResult> {
  const config = await resolveImportConfig({ ...options, csv: csvPath ?? options.csv }, process.env);
  const { repo } = config;

  if (options.dryRun) {
    logger.info('Dry run mode - no changes will be made.');
  }

  const { rows, skipped } = await readCsvRows(config.csvPath, { defaultStatus: config.defaultStatus });
  if (rows.length === 0) {
    logger.warn(`No importable rows in ${config.csvPath}. Nothing to do.`);
    return { created: 0, updated: 0, skipped: skipped.length, errors: [] };
  }
  logger.info(`Read ${rows.length} row(s) from ${config.csvPath}`);

  const { project, statusField } = await connectToProject(config);
  logger.info(`Project found: ${project.title} (id=${project.id}). Status options: ${formatStatusOptions(statusField)}`);

  const result = await importRows(rows, {
    repo,
    project,
    statusField,
    labels: new LabelRegistry(repo, config.labelColor, options.dryRun),
    options: { dryRun: options.dryRun, updateExisting: options.updateExisting },
  });
  result.skipped += skipped.length;

  printImportResult(result);
  if (result.errors.length === 0) {
    const verb = options.dryRun ? 'Would import' : 'Imported';
    logger.success(`${verb} ${result.created + result.updated} issue(s) into ${repo.owner}/${repo.name} and project "${project.title}".`);
  } else {
    process.exitCode = 1;
  }
  return result;
}
