/**
 * gcpkit
 *
 * CLI entry point. Wraps gcloud for website buckets, load balancers,
 * name checks and project bootstrap.
 */

import { Command } from 'commander';
import { checkCommand, lbCommand, logsCommand, projectCommand, siteCommand } from './commands';
import { reportError } from './commands/shared';

const program = new Command();

program
  .name('gcpkit')
  .description('Routine Google Cloud administration on top of gcloud')
  .version('0.1.0');

program.addCommand(siteCommand);
program.addCommand(lbCommand);
program.addCommand(checkCommand);
program.addCommand(projectCommand);
program.addCommand(logsCommand);

program.parseAsync().catch((error: unknown) => {
  process.exitCode = reportError('gcpkit', error);
});
