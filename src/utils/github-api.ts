import { Octokit } from 'octokit';
import { MAX_RETRIES } from '../constants.js';
import { logger } from './logger.js';

let client: Octokit | null = null;

interface ThrottledRequest {
  method: string;
  url: string;
}

function onRateLimit(retryAfter: number, options: ThrottledRequest, _octokit: unknown, retryCount: number): boolean {
  logger.warn(`Rate limit hit for ${options.method} ${options.url}`);
  if (retryCount < MAX_RETRIES) {
    logger.warn(`Retrying after ${retryAfter}s`);
    return true;
  }
  return false;
}

/**
 * Create the shared Octokit client. Transient failures are retried by
 * withRetry, so octokit's own retry plugin is turned off.
 */
export function initGitHubApi(token: string): Octokit {
  client = new Octokit({
    auth: token,
    userAgent: 'csv-project-importer',
    retry: { enabled: false },
    throttle: {
      onRateLimit,
      onSecondaryRateLimit: onRateLimit,
    },
  });
  return client;
}

export function getOctokit(): Octokit {
  if (!client) {
    throw new Error('GitHub API client is not initialized');
  }
  return client;
}
