/**
 * gcpkit project create
 *
 * Create one or more projects with billing, owner access and the core APIs,
 * then write setproj.sh and owner-setup.sh for the new owner.
 */

import { Command } from 'commander';
import * as path from 'path';
import { parseLabels, setupProjects } from '../../services/project-setup.service';
import { ensureReady, prepare, runAction } from '../shared';

interface ProjectCreateFlags {
  name?: string;
  billingAccount?: string;
  free?: boolean;
  timestamp?: boolean;
  activate?: boolean;
  outputDir: string;
  label: string[];
  dryRun?: boolean;
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export const createCommand = new Command('create')
  .description('Create GCP projects and bootstrap them for a new owner')
  .argument('<project-ids...>', 'Exact project IDs (6-30 lowercase letters, digits, hyphens)')
  .option('-n, --name <display-name>', 'Human-readable project name, at most 30 characters (default: the project ID)')
  .option('--billing-account <id>', 'Billing account (XXXXXX-XXXXXX-XXXXXX); default: first open account')
  .option('--free', 'Relax organization policies and grant Service Usage Consumer for a sandbox project')
  .option('--timestamp', 'Append the current epoch seconds to every project ID')
  .option('--activate', 'Switch gcloud and the ADC quota project to the new project')
  .option('--label <key=value>', 'Project label (repeatable)', collect, [])
  .option('-o, --output-dir <dir>', 'Where to write the helper scripts (one subdirectory per project when several)', '.')
  .option('-d, --dry-run', 'Show what would be done without doing it')
  .option('-v, --verbose', 'Show each step in detail')
  .action(
    runAction('project create', async (projectIds: string[], flags: ProjectCreateFlags) => {
      const labels = parseLabels(flags.label);
      const { ctx, config } = prepare(flags);
      await ensureReady(ctx);

      const results = await setupProjects(ctx, {
        projectIds,
        displayName: flags.name,
        billingAccount: flags.billingAccount ?? config.billingAccount,
        free: flags.free ?? false,
        timestamp: flags.timestamp ?? false,
        activate: flags.activate ?? false,
        labels,
        outputDir: path.resolve(flags.outputDir),
      });

      for (const result of results ?? []) {
        for (const script of result.scripts) {
          ctx.reporter.verbose(`Wrote ${script}`);
        }
      }
    })
  );
