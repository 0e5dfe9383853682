import { resolveProjectConfig, type ConfigFlags } from '../core/config.js';
import { logger } from '../utils/logger.js';
import { connectToProject } from './connect.js';

export async function statusesCommand(options: ConfigFlags): Promise<void> {
  const config = await resolveProjectConfig(options, process.env);
  const { project, statusField } = await connectToProject(config);

  logger.info(`Project: ${project.title} (#${project.number}, owner ${project.owner})`);
  logger.info('Status options:');
  for (const name of statusField.optionNames) {
    logger.info(`  - ${name}`);
  }
}
