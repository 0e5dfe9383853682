import type { CsvRow } from '../types/csv.js';
import type { IssueInput, StatusFieldInfo } from '../types/github.js';

/**
 * Build the issue payload for a CSV row
 */
export function mapIssueInput(row: CsvRow): IssueInput {
  return {
    title: row.title,
    body: row.body,
    labels: [...row.labels],
  };
}

/**
 * Normalize a status name for lookup against project options
 */
export function statusKey(status: string): string {
  return status.trim().toLowerCase();
}

/**
 * Find the option ID for a row status, or null when the project has no
 * such option.
 */
export function resolveStatusOption(status: string, statusField: StatusFieldInfo): string | null {
  return statusField.options[statusKey(status)] ?? null;
}

export function formatStatusOptions(statusField: StatusFieldInfo): string {
  return `[${statusField.optionNames.map((name) => `'${name}'`).join(', ')}]`;
}
