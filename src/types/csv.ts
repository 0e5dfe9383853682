export interface CsvRow {
  /** 1-based data row number; the header and blank lines are not counted */
  row: number;
  title: string;
  body: string;
  labels: string[];
  status: string;
}

export interface SkippedRow {
  row: number;
  reason: string;
}

export interface CsvReadResult {
  rows: CsvRow[];
  skipped: SkippedRow[];
}
