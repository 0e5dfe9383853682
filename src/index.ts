import { Command } from 'commander';
import dotenv from 'dotenv';
import { DEFAULT_LABEL_COLOR, DEFAULT_STATUS } from './constants.js';
import { importCommand, type ImportCommandOptions } from './commands/import.js';
import { statusesCommand } from './commands/statuses.js';
import { validateCommand } from './commands/validate.js';
import { errorMessage } from './utils/errors.js';
import { logger, setVerbose } from './utils/logger.js';

/**
 * Wrap a command action so failures are reported once and the process exits
 * with code 1 instead of crashing with a stack trace.
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<unknown>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      logger.error(errorMessage(err));
      process.exitCode = 1;
    }
  };
}

function addProjectOptions(command: Command): Command {
  return command
    .option('--repo <owner/repo>', 'target repository (env REPO, defaults to the git origin remote)')
    .option('--owner <login>', 'user or organization that owns the project (env PROJECT_OWNER, defaults to repo owner)')
    .option('--project <number>', 'project number as shown in its URL (env PROJECT_NUMBER)');
}

const program = new Command();

program
  .name('csv2project')
  .description('Create GitHub issues from CSV rows and place them on a GitHub Project board')
  .version('0.1.0')
  .option('-v, --verbose', 'print debug output')
  .hook('preAction', (thisCommand) => {
    setVerbose(Boolean(thisCommand.opts().verbose));
  });

addProjectOptions(
  program
    .command('import [csv]', { isDefault: true })
    .description('Import issues from a CSV file with Title, Body, Labels and Status columns'),
)
  .option('--csv <path>', 'CSV file to import (env CSV_PATH)')
  .option('--default-status <name>', `status for rows with an empty Status column (env DEFAULT_STATUS, default "${DEFAULT_STATUS}")`)
  .option('--label-color <hex>', `color for labels created on the fly (env LABEL_COLOR, default ${DEFAULT_LABEL_COLOR})`)
  .option('--update-existing', 'update an open issue with the same title instead of creating a duplicate')
  .option('--dry-run', 'show what would be imported without making changes')
  .action(run(async (csv: string | undefined, opts: ImportCommandOptions) => {
    await importCommand(csv, opts);
  }));

program
  .command('validate <csv>')
  .description('Parse a CSV file offline and show how its rows would be imported')
  .option('--default-status <name>', 'status for rows with an empty Status column')
  .action(run(async (csv: string, opts: { defaultStatus?: string }) => {
    await validateCommand(csv, { defaultStatus: opts.defaultStatus ?? process.env.DEFAULT_STATUS });
  }));

addProjectOptions(
  program
    .command('statuses')
    .description('List the Status options of the target project'),
)
  .action(run(async (opts: ImportCommandOptions) => {
    await statusesCommand(opts);
  }));

export async function main(argv: string[] = process.argv): Promise<void> {
  dotenv.config();
  await program.parseAsync(argv);
}
