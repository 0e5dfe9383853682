import { DEFAULT_LABEL_COLOR, DEFAULT_STATUS } from '../constants.js';
import type { RepoRef } from '../types/github.js';
import type { ImportConfig } from '../types/import.js';
import { ConfigError } from '../utils/errors.js';
import { detectRepoFromGit, parseRepoRef } from '../utils/git.js';

export interface ConfigFlags {
  repo?: string;
  owner?: string;
  project?: string;
  csv?: string;
  defaultStatus?: string;
  labelColor?: string;
}

export interface ProjectConfig {
  repo: RepoRef;
  projectOwner: string;
  projectNumber: number;
}

type RepoDetector = () => Promise<string | null>;

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

async function collectProjectConfig(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv,
  detectRepo: RepoDetector,
  problems: string[],
): Promise<Partial<ProjectConfig>> {
  const result: Partial<ProjectConfig> = {};

  const repoValue = firstNonEmpty(flags.repo, env.REPO) ?? (await detectRepo()) ?? undefined;
  if (!repoValue) {
    problems.push('Repository is required: pass --repo owner/repo or set REPO');
  } else {
    try {
      result.repo = parseRepoRef(repoValue);
    } catch (err) {
      problems.push(err instanceof Error ? err.message : String(err));
    }
  }

  const owner = firstNonEmpty(flags.owner, env.PROJECT_OWNER) ?? result.repo?.owner;
  if (owner) {
    result.projectOwner = owner;
  } else if (repoValue) {
    problems.push('Project owner is required: pass --owner or set PROJECT_OWNER');
  }

  const rawNumber = firstNonEmpty(flags.project, env.PROJECT_NUMBER);
  if (!rawNumber) {
    problems.push('Project number is required: pass --project or set PROJECT_NUMBER');
  } else if (!/^\d+$/.test(rawNumber) || Number(rawNumber) <= 0) {
    problems.push(`Project number must be a positive integer, got '${rawNumber}'`);
  } else {
    result.projectNumber = Number(rawNumber);
  }

  return result;
}

function isComplete(partial: Partial<ProjectConfig>): partial is ProjectConfig {
  return partial.repo !== undefined && partial.projectOwner !== undefined && partial.projectNumber !== undefined;
}

/**
 * Resolve the repository and project to talk to.
 * CLI flags win over environment variables; the repository falls back to the
 * git remote and the project owner to the repository owner.
 */
export async function resolveProjectConfig(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv,
  detectRepo: RepoDetector = detectRepoFromGit,
): Promise<ProjectConfig> {
  const problems: string[] = [];
  const partial = await collectProjectConfig(flags, env, detectRepo, problems);
  if (problems.length > 0 || !isComplete(partial)) {
    throw new ConfigError(problems);
  }
  return partial;
}

export async function resolveImportConfig(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv,
  detectRepo: RepoDetector = detectRepoFromGit,
): Promise<ImportConfig> {
  const problems: string[] = [];
  const partial = await collectProjectConfig(flags, env, detectRepo, problems);

  const csvPath = firstNonEmpty(flags.csv, env.CSV_PATH);
  if (!csvPath) {
    problems.push('CSV path is required: pass a file or set CSV_PATH');
  }

  const defaultStatus = firstNonEmpty(flags.defaultStatus, env.DEFAULT_STATUS) ?? DEFAULT_STATUS;

  const rawColor = firstNonEmpty(flags.labelColor, env.LABEL_COLOR) ?? DEFAULT_LABEL_COLOR;
  const labelColor = rawColor.replace(/^#/, '').toLowerCase();
  if (!/^[0-9a-f]{6}$/.test(labelColor)) {
    problems.push(`Label color must be a 6-digit hex value, got '${rawColor}'`);
  }

  if (problems.length > 0 || !isComplete(partial) || !csvPath) {
    throw new ConfigError(problems);
  }

  return {
    ...partial,
    csvPath,
    defaultStatus,
    labelColor,
  };
}
