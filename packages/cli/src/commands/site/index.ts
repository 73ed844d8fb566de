/**
 * gcpkit site
 *
 * Static website hosting in a Cloud Storage bucket.
 */

import { Command } from 'commander';
import {
  configureWebsite,
  createWebsiteBucket,
  deleteWebsiteBucket,
  listWebsiteFiles,
  makeWebsitePublic,
  removeWebsitePath,
  setupWebsite,
  showWebsiteStatus,
  uploadWebsite,
  type WebsiteTarget,
} from '../../services/website.service';
import { ensureReady, prepare, runAction, type CommandEnv } from '../shared';
import { siteSubcommand, websiteTarget, type SiteFlags } from './options';

/**
 * Resolve flags, check gcloud, and hand the target to an operation
 */
async function withTarget(
  flags: SiteFlags,
  operation: (env: CommandEnv, target: WebsiteTarget) => Promise<void>
): Promise<void> {
  const env = prepare(flags);
  const target = websiteTarget(flags, env.config);
  await ensureReady(env.ctx);
  env.ctx.reporter.verbose(`Project: ${target.projectId}, bucket: ${target.bucket}`);
  await operation(env, target);
}

const createCommand = siteSubcommand('create', 'Create the website bucket').action(
  runAction('site create', (flags: SiteFlags) =>
    withTarget(flags, ({ ctx }, target) => createWebsiteBucket(ctx, target))
  )
);

const uploadCommand = siteSubcommand('upload', 'Upload a local directory to the bucket').action(
  runAction('site upload', (flags: SiteFlags) =>
    withTarget(flags, ({ ctx }, target) => uploadWebsite(ctx, target, flags.source))
  )
);

const configureCommand = siteSubcommand('configure', 'Set the index and error pages').action(
  runAction('site configure', (flags: SiteFlags) =>
    withTarget(flags, ({ ctx }, target) => configureWebsite(ctx, target))
  )
);

const makePublicCommand = siteSubcommand('make-public', 'Grant public read access to the bucket').action(
  runAction('site make-public', (flags: SiteFlags) =>
    withTarget(flags, ({ ctx }, target) => makeWebsitePublic(ctx, target))
  )
);

const setupCommand = siteSubcommand('setup', 'Create, upload, configure and make public in one go')
  .option('--skip-public', 'Do not make the bucket public')
  .action(
    runAction('site setup', (flags: SiteFlags) =>
      withTarget(flags, ({ ctx }, target) =>
        setupWebsite(ctx, target, { sourceDir: flags.source, skipPublic: flags.skipPublic ?? false })
      )
    )
  );

const statusCommand = siteSubcommand('status', 'Show bucket details, public access and contents').action(
  runAction('site status', (flags: SiteFlags) =>
    withTarget(flags, ({ ctx }, target) => showWebsiteStatus(ctx, target))
  )
);

const listCommand = siteSubcommand('list', 'List files in the bucket')
  .option('-r, --recursive', 'List every object')
  .action(
    runAction('site list', (flags: SiteFlags) =>
      withTarget(flags, async ({ ctx }, target) => {
        await listWebsiteFiles(ctx, target, { recursive: flags.recursive ?? false });
      })
    )
  );

const removeCommand = siteSubcommand('remove', 'Remove a file, or a folder when the path ends with "/"')
  .option('--path <path>', 'Object path inside the bucket')
  .action(
    runAction('site remove', (flags: SiteFlags) =>
      withTarget(flags, ({ ctx }, target) => removeWebsitePath(ctx, target, flags.path))
    )
  );

const cleanCommand = siteSubcommand('clean', 'Delete the bucket and all its contents').action(
  runAction('site clean', (flags: SiteFlags) =>
    withTarget(flags, ({ ctx }, target) => deleteWebsiteBucket(ctx, target))
  )
);

export const siteCommand = new Command('site')
  .description('Host a static website in a Cloud Storage bucket')
  .addCommand(createCommand)
  .addCommand(uploadCommand)
  .addCommand(configureCommand)
  .addCommand(makePublicCommand)
  .addCommand(setupCommand)
  .addCommand(statusCommand)
  .addCommand(listCommand)
  .addCommand(removeCommand)
  .addCommand(cleanCommand);
