import { describe, it, expect, vi } from 'vitest';
import { resolveImportConfig, resolveProjectConfig } from '../src/core/config.js';
import { ConfigError } from '../src/utils/errors.js';

const noRemote = async (): Promise<string | null> => null;

describe('resolveImportConfig', () => {
  it('should prefer CLI flags over environment variables', async () => {
    const config = await resolveImportConfig(
      { repo: 'acme/app', project: '3', csv: 'from-flag.csv' },
      { REPO: 'other/repo', PROJECT_NUMBER: '9', CSV_PATH: 'from-env.csv' },
      noRemote,
    );

    expect(config).toEqual({
      repo: { owner: 'acme', name: 'app' },
      projectOwner: 'acme',
      projectNumber: 3,
      csvPath: 'from-flag.csv',
      defaultStatus: 'Todo',
      labelColor: 'ededed',
    });
  });

  it('should read every value from the environment', async () => {
    const config = await resolveImportConfig(
      {},
      {
        REPO: 'git@github.com:acme/widgets.git',
        PROJECT_OWNER: 'acme-org',
        PROJECT_NUMBER: '12',
        CSV_PATH: 'issues.csv',
        DEFAULT_STATUS: 'Backlog',
        LABEL_COLOR: '#FF0000',
      },
      noRemote,
    );

    expect(config).toEqual({
      repo: { owner: 'acme', name: 'widgets' },
      projectOwner: 'acme-org',
      projectNumber: 12,
      csvPath: 'issues.csv',
      defaultStatus: 'Backlog',
      labelColor: 'ff0000',
    });
  });

  it('should fall back to the git remote when no repository is given', async () => {
    const detectRepo = vi.fn(async () => 'https://github.com/octo/tools.git');
    const config = await resolveImportConfig({ project: '1', csv: 'a.csv' }, {}, detectRepo);

    expect(detectRepo).toHaveBeenCalledTimes(1);
    expect(config.repo).toEqual({ owner: 'octo', name: 'tools' });
    expect(config.projectOwner).toBe('octo');
  });

  it('should not consult the git remote when a repository is given', async () => {
    const detectRepo = vi.fn(async () => 'https://github.com/octo/tools.git');
    await resolveImportConfig({ repo: 'acme/app', project: '1', csv: 'a.csv' }, {}, detectRepo);
    expect(detectRepo).not.toHaveBeenCalled();
  });

  it('should report every missing value at once', async () => {
    const error = await resolveImportConfig({}, {}, noRemote).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.problems).toEqual([
      'Repository is required: pass --repo owner/repo or set REPO',
      'Project number is required: pass --project or set PROJECT_NUMBER',
      'CSV path is required: pass a file or set CSV_PATH',
    ]);
  });

  it('should reject a project number that is not a positive integer', async () => {
    for (const project of ['0', 'abc', '-2', '1.5']) {
      const error = await resolveImportConfig({ repo: 'a/b', project, csv: 'x.csv' }, {}, noRemote)
        .catch((err: unknown) => err);
      expect(error instanceof ConfigError && error.problems).toEqual([
        `Project number must be a positive integer, got '${project}'`,
      ]);
    }
  });

  it('should reject an invalid label color', async () => {
    await expect(
      resolveImportConfig({ repo: 'a/b', project: '1', csv: 'x.csv', labelColor: 'blue' }, {}, noRemote),
    ).rejects.toThrow("Label color must be a 6-digit hex value, got 'blue'");
  });

  it('should reject a malformed repository', async () => {
    await expect(
      resolveImportConfig({ repo: 'not-a-repo', project: '1', csv: 'x.csv' }, {}, noRemote),
    ).rejects.toThrow('Invalid repository "not-a-repo". Use owner/repo (e.g., myuser/myrepo)');
  });
});

describe('resolveProjectConfig', () => {
  it('should not require a CSV path', async () => {
    const config = await resolveProjectConfig({ repo: 'acme/app', owner: 'acme-org', project: '7' }, {}, noRemote);
    expect(config).toEqual({
      repo: { owner: 'acme', name: 'app' },
      projectOwner: 'acme-org',
      projectNumber: 7,
    });
  });
});
