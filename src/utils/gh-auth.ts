import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

/**
 * Read a token from the GitHub CLI's stored credentials.
 * Returns null when gh is missing or not logged in.
 */
export async function getGhCliToken(): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync('gh', ['auth', 'token']);
    const token = stdout.trim();
    return token || null;
  } catch (err) {
    logger.debug(`gh auth token failed: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Resolve the API token: GITHUB_TOKEN, then GH_TOKEN, then the GitHub CLI.
 */
export async function resolveToken(
  env: NodeJS.ProcessEnv,
  readCliToken: () => Promise<string | null> = getGhCliToken,
): Promise<string> {
  const fromEnv = env.GITHUB_TOKEN?.trim() || env.GH_TOKEN?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  const fromCli = await readCliToken();
  if (fromCli) {
    logger.debug('Using token from GitHub CLI');
    return fromCli;
  }

  throw new Error(
    'No GitHub token found. Set GITHUB_TOKEN (with repo and project scopes) or run: gh auth login -s project',
  );
}
