/**
 * gcpkit project
 * Project creation and bootstrap
 */

import { Command } from 'commander';
import { createCommand } from './create';

export const projectCommand = new Command('project')
  .description('Create and bootstrap GCP projects')
  .addCommand(createCommand);
