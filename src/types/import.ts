import type { RepoRef, ProjectInfo, StatusFieldInfo } from './github.js';
import type { LabelRegistry } from '../core/labels.js';

export interface ImportConfig {
  repo: RepoRef;
  projectOwner: string;
  projectNumber: number;
  csvPath: string;
  defaultStatus: string;
  labelColor: string;
}

export interface ImportOptions {
  dryRun?: boolean;
  updateExisting?: boolean;
}

export interface ImportContext {
  repo: RepoRef;
  project: ProjectInfo;
  statusField: StatusFieldInfo;
  labels: LabelRegistry;
  options: ImportOptions;
}

export interface ImportError {
  row: number;
  title: string;
  error: string;
}

export interface ImportResult {
  created: number;
  updated: number;
  skipped: number;
  errors: ImportError[];
}
