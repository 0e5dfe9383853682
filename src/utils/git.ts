import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { RepoRef } from '../types/github.js';

const execFileAsync = promisify(execFile);

/**
 * Parse a repository reference into owner and name.
 * Accepts `owner/name` as well as git remote URLs:
 *   - https://github.com/owner/repo.git -> { owner: "owner", name: "repo" }
 *   - git@github.com:owner/repo.git     -> { owner: "owner", name: "repo" }
 */
export function parseRepoRef(value: string): RepoRef {
  const input = value.trim();

  const sshMatch = input.match(/^[^@\s]+@[^:\s]+:([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/);
  if (sshMatch) {
    return { owner: sshMatch[1], name: sshMatch[2] };
  }

  const urlMatch = input.match(/^(?:https?|ssh|git):\/\/[^/\s]+\/([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/);
  if (urlMatch) {
    return { owner: urlMatch[1], name: urlMatch[2] };
  }

  const slugMatch = input.match(/^([^/\s]+)\/([^/\s]+)$/);
  if (slugMatch) {
    return { owner: slugMatch[1], name: slugMatch[2] };
  }

  throw new Error(`Invalid repository "${value}". Use owner/repo (e.g., myuser/myrepo)`);
}

/**
 * Read the "origin" remote of the git repository in the working directory.
 * Returns null outside a repository or when origin is not set.
 */
export async function detectRepoFromGit(cwd: string = process.cwd()): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync('git', ['remote', 'get-url', 'origin'], { cwd });
    return stdout.trim() || null;
  } catch {
    return null;
  }
}
