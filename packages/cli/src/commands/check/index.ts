/**
 * gcpkit check
 * Name availability checks
 */

import { Command } from 'commander';
import { bucketsCommand } from './buckets';
import { projectsCommand } from './projects';

export const checkCommand = new Command('check')
  .description('Check bucket names and project IDs')
  .addCommand(bucketsCommand)
  .addCommand(projectsCommand);
