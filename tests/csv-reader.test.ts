import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseCsvContent, readCsvRows, splitLabels } from '../src/core/csv-reader.js';
import { logger } from '../src/utils/logger.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

const SAMPLE = [
  'Title,Body,Labels,Status',
  'First,"Body, with comma","bug, ui ,,Bug",In Progress',
  ',orphan body,,',
  '',
  'Second,"Line1',
  'Line2",,',
  '',
].join('\n');

describe('splitLabels', () => {
  it('should trim labels and drop empty entries', () => {
    expect(splitLabels(' bug , , docs,')).toEqual(['bug', 'docs']);
  });

  it('should collapse case-insensitive duplicates keeping the first spelling', () => {
    expect(splitLabels('Bug,bug,BUG,ui')).toEqual(['Bug', 'ui']);
  });

  it('should return an empty list for an empty or missing cell', () => {
    expect(splitLabels('')).toEqual([]);
    expect(splitLabels(undefined)).toEqual([]);
  });
});

describe('parseCsvContent', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should map each titled row to an import row', () => {
    const { rows } = parseCsvContent(SAMPLE);
    expect(rows).toEqual([
      { row: 1, title: 'First', body: 'Body, with comma', labels: ['bug', 'ui'], status: 'In Progress' },
      { row: 3, title: 'Second', body: 'Line1\nLine2', labels: [], status: 'Todo' },
    ]);
  });

  it('should skip rows without a title and report them', () => {
    const { skipped } = parseCsvContent(SAMPLE);
    expect(skipped).toEqual([{ row: 2, reason: 'missing title' }]);
    expect(logger.info).toHaveBeenCalledWith('Skipping row 2 without Title');
  });

  it('should use the given default status for empty Status cells', () => {
    const { rows } = parseCsvContent('Title,Status\nA,\nB,Done\n', { defaultStatus: 'Backlog' });
    expect(rows.map((r) => r.status)).toEqual(['Backlog', 'Done']);
  });

  it('should ignore a byte order mark before the header', () => {
    const { rows } = parseCsvContent('\uFEFFTitle,Status\nA,Done\n');
    expect(rows).toEqual([{ row: 1, title: 'A', body: '', labels: [], status: 'Done' }]);
  });

  it('should treat missing columns as empty', () => {
    const { rows } = parseCsvContent('Title\nOnly a title\n');
    expect(rows).toEqual([{ row: 1, title: 'Only a title', body: '', labels: [], status: 'Todo' }]);
  });

  it('should warn when the header has no Title column', () => {
    const { rows, skipped } = parseCsvContent('Name,Status\nx,Todo\n');
    expect(rows).toEqual([]);
    expect(skipped).toEqual([{ row: 1, reason: 'missing title' }]);
    expect(logger.warn).toHaveBeenCalledWith("CSV has no 'Title' column. Found: Name, Status");
  });

  it('should count a row of empty cells as skipped and keep later row numbers', () => {
    const { rows, skipped } = parseCsvContent('Title,Body,Labels,Status\n,,,\nB,,,\n');
    expect(skipped).toEqual([{ row: 1, reason: 'missing title' }]);
    expect(rows).toEqual([{ row: 2, title: 'B', body: '', labels: [], status: 'Todo' }]);
    expect(logger.info).toHaveBeenCalledWith('Skipping row 1 without Title');
  });

  it('should match header names exactly', () => {
    const { rows } = parseCsvContent('title, Status\nA,Todo\n');
    expect(rows).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("CSV has no 'Title' column. Found: title,  Status");
  });

  it('should warn about ragged rows with their data row number', () => {
    parseCsvContent('Title,Body\nA\nB,c,d\n');
    expect(logger.warn).toHaveBeenCalledWith(expect.stringMatching(/^CSV Row 1: Too few fields/));
    expect(logger.warn).toHaveBeenCalledWith(expect.stringMatching(/^CSV Row 2: Too many fields/));
  });

  it('should warn about an unterminated quote on the row that opened it', () => {
    const { rows } = parseCsvContent('Title,Body\nA,"oops\nB,c\n');
    expect(rows.map((r) => r.row)).toEqual([1]);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringMatching(/^CSV Row 1: Quoted field unterminated/));
  });

  it('should return nothing for an empty file', () => {
    expect(parseCsvContent('')).toEqual({ rows: [], skipped: [] });
  });
});

describe('readCsvRows', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'csv2project-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should read and parse a file from disk', async () => {
    const filePath = join(tempDir, 'issues.csv');
    await writeFile(filePath, 'Title,Body,Labels,Status\nSet up CI,Run tests,"infra, ci",Todo\n', 'utf-8');

    const result = await readCsvRows(filePath);
    expect(result).toEqual({
      rows: [{ row: 1, title: 'Set up CI', body: 'Run tests', labels: ['infra', 'ci'], status: 'Todo' }],
      skipped: [],
    });
  });

  it('should reject when the file does not exist', async () => {
    await expect(readCsvRows(join(tempDir, 'missing.csv'))).rejects.toThrow(/ENOENT/);
  });
});
