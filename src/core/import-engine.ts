import type { CsvRow } from '../types/csv.js';
import type { IssueRef } from '../types/github.js';
import type { ImportContext, ImportResult } from '../types/import.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatStatusOptions, mapIssueInput, resolveStatusOption } from './field-mapper.js';
import {
  addProjectItem,
  createIssue,
  findOpenIssueByTitle,
  setSingleSelectValue,
  updateIssue,
} from './github-project.js';

type RowOutcome = 'created' | 'updated';

async function importRow(row: CsvRow, context: ImportContext): Promise<RowOutcome> {
  const { repo, project, statusField, labels, options } = context;

  const optionId = resolveStatusOption(row.status, statusField);
  if (!optionId) {
    throw new Error(`Status '${row.status}' not found in project. Available: ${formatStatusOptions(statusField)}`);
  }

  await labels.ensure(row.labels);

  const input = mapIssueInput(row);
  const existing = options.updateExisting
    ? await findOpenIssueByTitle(repo.owner, repo.name, row.title)
    : null;

  if (options.dryRun) {
    const action = existing ? `update #${existing.number}` : 'create issue';
    logger.info(`[dry-run] Row ${row.row}: would ${action} "${row.title}" with status '${row.status}'`);
    return existing ? 'updated' : 'created';
  }

  let issue: IssueRef;
  let outcome: RowOutcome;
  if (existing) {
    issue = await updateIssue(repo.owner, repo.name, existing.number, input);
    outcome = 'updated';
    logger.info(`Issue updated: #${issue.number}`);
  } else {
    issue = await createIssue(repo.owner, repo.name, input);
    outcome = 'created';
    logger.info(`Issue created: #${issue.number}`);
  }

  const itemId = await addProjectItem(project.id, issue.nodeId);
  await setSingleSelectValue(project.id, itemId, statusField.fieldId, optionId);
  logger.debug(`#${issue.number} -> project item ${itemId}, status '${row.status}'`);

  return outcome;
}

/**
 * Import rows one at a time: ensure labels, create or update the issue, add
 * it to the project and set its Status. A failing row is recorded in
 * `errors` and the run moves on to the next row.
 */
export async function importRows(rows: CsvRow[], context: ImportContext): Promise<ImportResult> {
  const result: ImportResult = {
    created: 0,
    updated: 0,
    skipped: 0,
    errors: [],
  };

  for (const row of rows) {
    try {
      const outcome = await importRow(row, context);
      result[outcome] += 1;
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`Row ${row.row} ("${row.title}"): ${message}`);
      result.errors.push({ row: row.row, title: row.title, error: message });
    }
  }

  return result;
}
