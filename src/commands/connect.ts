import type { ProjectConfig } from '../core/config.js';
import { findProject, getStatusField } from '../core/github-project.js';
import type { ProjectInfo, StatusFieldInfo } from '../types/github.js';
import { resolveToken } from '../utils/gh-auth.js';
import { initGitHubApi } from '../utils/github-api.js';
import { logger } from '../utils/logger.js';

/**
 * Authenticate and look up the target project and its Status field.
 */
export async function connectToProject(
  config: ProjectConfig,
): Promise<{ project: ProjectInfo; statusField: StatusFieldInfo }> {
  const token = await resolveToken(process.env);
  initGitHubApi(token);

  logger.info(`Looking up project #${config.projectNumber} owned by ${config.projectOwner}`);
  const project = await findProject(config.projectOwner, config.projectNumber);
  const statusField = getStatusField(project);
  return { project, statusField };
}
